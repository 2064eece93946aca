import type { IsoDate, ProgressContext, ProgressSeriesInput } from "@/types/progress";
import { deriveSeries, normalizeRecords, summarizeSeries } from "@/lib/domain/metrics-engine";
import { todayIsoDate } from "@/lib/utils/calendar";

export interface ProgressContextOptions {
  /** Reference day for "today" figures and the in-progress month. Defaults to the current UTC date. */
  today?: IsoDate;
}

export interface ProgressSeriesLoader {
  loadSeries: (token: string) => Promise<ProgressSeriesInput>;
}

export function buildProgressContext(input: ProgressSeriesInput, options: ProgressContextOptions = {}): ProgressContext {
  const today = options.today ?? todayIsoDate();
  const records = normalizeRecords(input.records);
  const initialTimeSeconds = Math.max(0, input.initialTimeSeconds);
  const derived = deriveSeries(records, initialTimeSeconds);

  return {
    records,
    initialTimeSeconds,
    dailyGoalSeconds: input.dailyGoalSeconds,
    today,
    derived,
    summary: summarizeSeries(records, derived, initialTimeSeconds, today)
  };
}

/** Fetches a fresh series and rebuilds the context from scratch. */
export async function reloadProgressContext(
  loader: ProgressSeriesLoader,
  token: string,
  options: ProgressContextOptions = {}
): Promise<ProgressContext> {
  const input = await loader.loadSeries(token);
  return buildProgressContext(input, options);
}

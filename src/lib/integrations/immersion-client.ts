import { z } from "zod";

import { getEnv } from "@/lib/config/env";
import type { ProgressSeriesLoader } from "@/lib/domain/progress-context";
import { isIsoDate } from "@/lib/utils/calendar";
import { createChildLogger } from "@/lib/utils/logger";
import type { DailyRecord, ProgressSeriesInput } from "@/types/progress";

export const DAY_WATCHED_TIME_PATH = "/dayWatchedTime";
export const USER_PATH = "/user";
export const EXTERNAL_TIME_PATH = "/externalTime";

const log = createChildLogger({ module: "immersion-client" });

const dailyRecordSchema = z.object({
  date: z.string().refine(isIsoDate, "date must be YYYY-MM-DD"),
  timeSeconds: z.number().int().min(0),
  goalReached: z.boolean().default(false)
});

const dayWatchedTimeSchema = z.array(dailyRecordSchema);

const userSchema = z.object({
  user: z.object({
    dailyGoalSeconds: z.number().int().positive()
  })
});

const externalTimeSchema = z.object({
  externalTimeSeconds: z.number().int().min(0)
});

export class ProviderAuthError extends Error {
  constructor(readonly status: number) {
    super(`Provider rejected the bearer token (HTTP ${status}).`);
    this.name = "ProviderAuthError";
  }
}

export class ProviderRequestError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status: number | null = null
  ) {
    super(message);
    this.name = "ProviderRequestError";
  }
}

export interface ImmersionClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export function buildProviderUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${path}`;
}

export function normalizeBearerToken(raw: string): string {
  return raw.trim().replace(/^bearer\s+/i, "");
}

export class ImmersionClient implements ProgressSeriesLoader {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: ImmersionClientOptions = {}) {
    const env = getEnv();
    this.baseUrl = options.baseUrl ?? env.IMMERSION_API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? env.IMMERSION_API_TIMEOUT_MS;
  }

  private async getJson<T>(path: string, token: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = buildProviderUrl(this.baseUrl, path);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          Accept: "application/json",
          Authorization: `Bearer ${normalizeBearerToken(token)}`
        },
        cache: "no-store",
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new ProviderRequestError(`Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`, url);
    }

    if (response.status === 401 || response.status === 403) {
      throw new ProviderAuthError(response.status);
    }

    if (!response.ok) {
      throw new ProviderRequestError(`HTTP ${response.status} from ${url}`, url, response.status);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new ProviderRequestError(`Non-JSON response from ${url}`, url, response.status);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderRequestError(`Unexpected payload from ${url}: ${parsed.error.issues[0]?.message ?? "invalid"}`, url, response.status);
    }

    return parsed.data;
  }

  async fetchDailyRecords(token: string): Promise<DailyRecord[]> {
    return this.getJson(DAY_WATCHED_TIME_PATH, token, dayWatchedTimeSchema);
  }

  async fetchDailyGoalSeconds(token: string): Promise<number> {
    const payload = await this.getJson(USER_PATH, token, userSchema);
    return payload.user.dailyGoalSeconds;
  }

  /** Time watched before tracking started. Missing or failing data counts as zero. */
  async fetchInitialTimeSeconds(token: string): Promise<number> {
    try {
      const payload = await this.getJson(EXTERNAL_TIME_PATH, token, externalTimeSchema);
      return payload.externalTimeSeconds;
    } catch (error) {
      if (error instanceof ProviderAuthError) {
        throw error;
      }
      log.warn({ endpoint: EXTERNAL_TIME_PATH, reason: error instanceof Error ? error.message : String(error) }, "Initial time unavailable, using 0");
      return 0;
    }
  }

  async loadSeries(token: string): Promise<ProgressSeriesInput> {
    const startedAt = Date.now();
    const [records, dailyGoalSeconds, initialTimeSeconds] = await Promise.all([
      this.fetchDailyRecords(token),
      this.fetchDailyGoalSeconds(token),
      this.fetchInitialTimeSeconds(token)
    ]);

    log.info({ records: records.length, durationMs: Date.now() - startedAt }, "Loaded immersion series");

    return { records, dailyGoalSeconds, initialTimeSeconds };
  }
}

import type {
  BestDay,
  ConsistencyStats,
  DailyRecord,
  DerivedDay,
  GoalStats,
  IsoDate,
  MonthlyBreakdownRow,
  ProgressSummary,
  StreakStats,
  WeekdayAverage,
  WeekdayName,
  WindowComparison,
  YearHeatmapCell
} from "@/types/progress";
import {
  BEST_DAYS_COUNT,
  MILESTONES,
  MONTHLY_BREAKDOWN_MONTHS,
  ROLLING_WINDOWS,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE
} from "@/lib/domain/constants";
import {
  WEEKDAY_NAMES,
  daysInMonth,
  eachDateOfYear,
  isoWeek,
  isoWeekday,
  isoWeeksInYear,
  monthKey,
  weekdayName
} from "@/lib/utils/calendar";

function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function percentage(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

/**
 * Sorts by date and collapses duplicate dates into one record
 * (seconds summed, goal reached if any duplicate reached it).
 */
export function normalizeRecords(records: DailyRecord[]): DailyRecord[] {
  const byDate = new Map<IsoDate, DailyRecord>();

  for (const record of records) {
    const existing = byDate.get(record.date);
    if (!existing) {
      byDate.set(record.date, { ...record });
      continue;
    }

    byDate.set(record.date, {
      date: record.date,
      timeSeconds: existing.timeSeconds + record.timeSeconds,
      goalReached: existing.goalReached || record.goalReached
    });
  }

  return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
}

export function computeCumulative(
  records: DailyRecord[],
  initialTimeSeconds: number
): Array<Pick<DerivedDay, "cumulativeSeconds" | "cumulativeMinutes" | "cumulativeHours">> {
  let running = initialTimeSeconds;

  return records.map((record) => {
    running += record.timeSeconds;
    return {
      cumulativeSeconds: running,
      cumulativeMinutes: running / SECONDS_PER_MINUTE,
      cumulativeHours: running / SECONDS_PER_HOUR
    };
  });
}

/**
 * Splits a boolean sequence into maximal runs of equal value.
 * Returns the 1-based position inside each `true` run (0 for `false`)
 * and the lengths of all `true` runs in order.
 */
export function segmentRuns(flags: boolean[]): { positions: number[]; trueRuns: number[] } {
  const positions: number[] = [];
  const trueRuns: number[] = [];
  let run = 0;

  flags.forEach((flag, index) => {
    run = flag ? run + 1 : 0;
    positions.push(run);

    const closesRun = flag && (index === flags.length - 1 || !flags[index + 1]);
    if (closesRun) {
      trueRuns.push(run);
    }
  });

  return { positions, trueRuns };
}

export function computeStreaks(records: DailyRecord[]): StreakStats {
  const { positions, trueRuns } = segmentRuns(records.map((record) => record.timeSeconds > 0));
  const lastPosition = positions.at(-1) ?? 0;

  return {
    runLengths: positions,
    currentStreak: lastPosition,
    longestStreak: trueRuns.length > 0 ? Math.max(...trueRuns) : 0,
    averageStreak: mean(trueRuns)
  };
}

export function computeRollingAverages(records: DailyRecord[], window: number): number[] {
  const size = Math.max(1, Math.floor(window));
  const output: number[] = [];
  let windowSum = 0;

  records.forEach((record, index) => {
    windowSum += record.timeSeconds;
    if (index >= size) {
      windowSum -= records[index - size].timeSeconds;
    }
    output.push(windowSum / Math.min(index + 1, size));
  });

  return output;
}

export function computeCumulativeAverages(records: DailyRecord[]): number[] {
  let running = 0;
  return records.map((record, index) => {
    running += record.timeSeconds;
    return running / (index + 1);
  });
}

export function computeGoalStats(records: DailyRecord[]): GoalStats {
  const { positions, trueRuns } = segmentRuns(records.map((record) => record.goalReached));
  const goalsReached = records.filter((record) => record.goalReached).length;

  return {
    currentGoalStreak: positions.at(-1) ?? 0,
    longestGoalStreak: trueRuns.length > 0 ? Math.max(...trueRuns) : 0,
    goalsReached,
    totalDays: records.length,
    goalRate: percentage(goalsReached, records.length)
  };
}

export function computeConsistency(records: DailyRecord[]): ConsistencyStats {
  const daysWatched = records.filter((record) => record.timeSeconds > 0).length;
  return {
    percentage: percentage(daysWatched, records.length),
    daysWatched,
    totalDays: records.length
  };
}

export function computeDayOfWeekAverages(records: DailyRecord[]): WeekdayAverage[] {
  const buckets = new Map<WeekdayName, number[]>(WEEKDAY_NAMES.map((name) => [name, []]));

  for (const record of records) {
    buckets.get(weekdayName(record.date))?.push(record.timeSeconds);
  }

  return WEEKDAY_NAMES.map((weekday) => {
    const values = buckets.get(weekday) ?? [];
    return {
      weekday,
      averageSeconds: mean(values),
      days: values.length
    };
  });
}

export function computeMonthlyBreakdown(
  records: DailyRecord[],
  today: IsoDate,
  lastNMonths: number = MONTHLY_BREAKDOWN_MONTHS
): MonthlyBreakdownRow[] {
  const byMonth = new Map<string, DailyRecord[]>();
  for (const record of records) {
    const key = monthKey(record.date);
    const group = byMonth.get(key) ?? [];
    group.push(record);
    byMonth.set(key, group);
  }

  const currentMonth = monthKey(today);
  const months = [...byMonth.keys()].sort().slice(-Math.max(0, lastNMonths));

  return months.map((month) => {
    const monthRecords = byMonth.get(month) ?? [];
    const presentDates = new Set(monthRecords.map((record) => record.date));
    const practicedDates = new Set(monthRecords.filter((record) => record.timeSeconds > 0).map((record) => record.date));
    const [year, monthNumber] = month.split("-").map((part) => Number(part));

    return {
      month,
      daysPracticed: practicedDates.size,
      daysGoalMet: monthRecords.filter((record) => record.goalReached).length,
      daysInPeriod: month === currentMonth ? presentDates.size : daysInMonth(year, monthNumber)
    };
  });
}

export function heatmapWeek(date: IsoDate): number {
  const { isoYear, week } = isoWeek(date);
  const month = Number(date.slice(5, 7));
  const calendarYear = Number(date.slice(0, 4));

  if (month === 12 && isoYear > calendarYear) {
    return week + 52;
  }
  if (month === 1 && isoYear < calendarYear) {
    return week - isoWeeksInYear(isoYear);
  }
  return week;
}

export function computeYearHeatmap(records: DailyRecord[], year: number): YearHeatmapCell[] {
  const secondsByDate = new Map(records.map((record) => [record.date, record.timeSeconds]));

  return eachDateOfYear(year).map((date) => ({
    date,
    seconds: secondsByDate.get(date) ?? 0,
    weekday: isoWeekday(date),
    week: heatmapWeek(date)
  }));
}

export function computeWindowComparison(records: DailyRecord[], window: number): WindowComparison {
  const recent = records.slice(-window);
  const previous = records.length >= window * 2 ? records.slice(-window * 2, -window) : [];
  const recentTotalSeconds = recent.reduce((sum, record) => sum + record.timeSeconds, 0);
  const previousTotalSeconds = previous.reduce((sum, record) => sum + record.timeSeconds, 0);
  const recentAverageSeconds = mean(recent.map((record) => record.timeSeconds));

  return {
    window,
    recentTotalSeconds,
    previousTotalSeconds,
    changeSeconds: recentTotalSeconds - previousTotalSeconds,
    recentAverageSeconds,
    deltaVsOverallSeconds: recentAverageSeconds - mean(records.map((record) => record.timeSeconds))
  };
}

export function computeBestDays(records: DailyRecord[], count: number = BEST_DAYS_COUNT): BestDay[] {
  if (records.length < count) {
    return [];
  }

  return [...records]
    .sort((a, b) => b.timeSeconds - a.timeSeconds || a.date.localeCompare(b.date))
    .slice(0, count)
    .map((record) => ({ date: record.date, timeSeconds: record.timeSeconds }));
}

export function computeTodaySeconds(records: DailyRecord[], today: IsoDate): number {
  return records.filter((record) => record.date === today).reduce((sum, record) => sum + record.timeSeconds, 0);
}

export function deriveSeries(records: DailyRecord[], initialTimeSeconds: number): DerivedDay[] {
  const cumulative = computeCumulative(records, initialTimeSeconds);
  const streaks = computeStreaks(records);
  const [shortWindow, longWindow] = ROLLING_WINDOWS;
  const rolling7 = computeRollingAverages(records, shortWindow);
  const rolling30 = computeRollingAverages(records, longWindow);
  const cumulativeAverages = computeCumulativeAverages(records);

  return records.map((record, index) => ({
    date: record.date,
    timeSeconds: record.timeSeconds,
    goalReached: record.goalReached,
    ...cumulative[index],
    isActive: record.timeSeconds > 0,
    streakRunLength: streaks.runLengths[index],
    rollingAvg7: rolling7[index],
    rollingAvg30: rolling30[index],
    cumulativeAvg: cumulativeAverages[index]
  }));
}

export function summarizeSeries(
  records: DailyRecord[],
  derived: DerivedDay[],
  initialTimeSeconds: number,
  today: IsoDate
): ProgressSummary {
  const { currentStreak, longestStreak, averageStreak } = computeStreaks(records);
  const last = derived.at(-1);
  const currentHours = last?.cumulativeHours ?? initialTimeSeconds / SECONDS_PER_HOUR;

  return {
    totalDays: records.length,
    totalSeconds: records.reduce((sum, record) => sum + record.timeSeconds, 0),
    currentHours,
    averageSecondsPerDay: mean(records.map((record) => record.timeSeconds)),
    current7DayAverage: last?.rollingAvg7 ?? 0,
    current30DayAverage: last?.rollingAvg30 ?? 0,
    todaySeconds: computeTodaySeconds(records, today),
    firstDate: derived[0]?.date ?? null,
    lastDate: last?.date ?? null,
    streaks: { currentStreak, longestStreak, averageStreak },
    goals: computeGoalStats(records),
    consistency: computeConsistency(records),
    milestonesReached: MILESTONES.filter((milestone) => milestone <= currentHours).length
  };
}

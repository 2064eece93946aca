import { describe, expect, it } from "vitest";

import {
  computeBestDays,
  computeConsistency,
  computeDayOfWeekAverages,
  computeGoalStats,
  computeMonthlyBreakdown,
  computeRollingAverages,
  computeStreaks,
  computeTodaySeconds,
  computeWindowComparison,
  computeYearHeatmap,
  deriveSeries,
  heatmapWeek,
  normalizeRecords,
  summarizeSeries
} from "@/lib/domain/metrics-engine";
import { addDays } from "@/lib/utils/calendar";
import type { DailyRecord } from "@/types/progress";

function day(date: string, timeSeconds: number, goalReached = false): DailyRecord {
  return { date, timeSeconds, goalReached };
}

function consecutive(start: string, seconds: number[]): DailyRecord[] {
  return seconds.map((value, index) => day(addDays(start, index), value));
}

describe("metrics engine", () => {
  it("sorts records and merges duplicate dates", () => {
    const records = normalizeRecords([day("2024-01-02", 100), day("2024-01-01", 50), day("2024-01-02", 20, true)]);

    expect(records).toEqual([day("2024-01-01", 50), day("2024-01-02", 120, true)]);
  });

  it("derives cumulative totals, streaks and averages for a single day", () => {
    const [derived] = deriveSeries([day("2024-03-01", 3600)], 0);

    expect(derived).toEqual({
      date: "2024-03-01",
      timeSeconds: 3600,
      goalReached: false,
      cumulativeSeconds: 3600,
      cumulativeMinutes: 60,
      cumulativeHours: 1,
      isActive: true,
      streakRunLength: 1,
      rollingAvg7: 3600,
      rollingAvg30: 3600,
      cumulativeAvg: 3600
    });
  });

  it("adds the initial time to cumulative totals only", () => {
    const derived = deriveSeries(consecutive("2024-03-01", [1800, 1800]), 7200);

    expect(derived.map((entry) => entry.cumulativeHours)).toEqual([2.5, 3]);
    expect(derived.map((entry) => entry.cumulativeAvg)).toEqual([1800, 1800]);
  });

  it("tracks the current streak from the last day", () => {
    const records = [day("2024-01-01", 0), day("2024-01-02", 1800, true)];

    expect(computeStreaks(records)).toEqual({ runLengths: [0, 1], currentStreak: 1, longestStreak: 1, averageStreak: 1 });
    expect(computeConsistency(records)).toEqual({ percentage: 50, daysWatched: 1, totalDays: 2 });
    expect(computeGoalStats(records)).toEqual({
      currentGoalStreak: 1,
      longestGoalStreak: 1,
      goalsReached: 1,
      totalDays: 2,
      goalRate: 50
    });
  });

  it("segments goal runs separately from activity", () => {
    const records = [day("2024-01-01", 60, true), day("2024-01-02", 60, true), day("2024-01-03", 60), day("2024-01-04", 60, true)];

    expect(computeGoalStats(records)).toEqual({
      currentGoalStreak: 1,
      longestGoalStreak: 2,
      goalsReached: 3,
      totalDays: 4,
      goalRate: 75
    });
  });

  it("segments active runs and averages their lengths", () => {
    const streaks = computeStreaks(consecutive("2024-01-01", [5, 0, 5, 5, 0, 5, 5, 5]));

    expect(streaks.runLengths).toEqual([1, 0, 1, 2, 0, 1, 2, 3]);
    expect(streaks.currentStreak).toBe(3);
    expect(streaks.longestStreak).toBe(3);
    expect(streaks.averageStreak).toBe(2);
  });

  it("resets the current streak after an idle last day", () => {
    expect(computeStreaks(consecutive("2024-01-01", [60, 60, 0])).currentStreak).toBe(0);
  });

  it("averages over the days available while a window fills", () => {
    expect(computeRollingAverages(consecutive("2024-01-01", [10, 20, 30, 40]), 2)).toEqual([10, 15, 25, 35]);
  });

  it("summarizes an empty series with zeros and the initial time", () => {
    const summary = summarizeSeries([], [], 7200, "2024-01-01");

    expect(summary.currentHours).toBe(2);
    expect(summary.totalDays).toBe(0);
    expect(summary.averageSecondsPerDay).toBe(0);
    expect(summary.streaks).toEqual({ currentStreak: 0, longestStreak: 0, averageStreak: 0 });
    expect(summary.consistency.percentage).toBe(0);
    expect(summary.goals.goalRate).toBe(0);
    expect(summary.firstDate).toBeNull();
    expect(summary.milestonesReached).toBe(0);
  });

  it("counts tracked days only for the month in progress", () => {
    const records = [
      day("2024-01-05", 60, true),
      day("2024-01-10", 0),
      day("2024-02-01", 30),
      day("2024-02-02", 30, true)
    ];

    expect(computeMonthlyBreakdown(records, "2024-02-15")).toEqual([
      { month: "2024-01", daysPracticed: 1, daysGoalMet: 1, daysInPeriod: 31 },
      { month: "2024-02", daysPracticed: 2, daysGoalMet: 1, daysInPeriod: 2 }
    ]);
    expect(computeMonthlyBreakdown(records, "2024-02-15", 1).map((row) => row.month)).toEqual(["2024-02"]);
  });

  it("averages minutes per weekday in Monday-first order", () => {
    const averages = computeDayOfWeekAverages([day("2024-01-01", 600), day("2024-01-08", 1200), day("2024-01-02", 300)]);

    expect(averages).toHaveLength(7);
    expect(averages[0]).toEqual({ weekday: "Monday", averageSeconds: 900, days: 2 });
    expect(averages[1]).toEqual({ weekday: "Tuesday", averageSeconds: 300, days: 1 });
    expect(averages[2]).toEqual({ weekday: "Wednesday", averageSeconds: 0, days: 0 });
  });

  it("places year-boundary days in the calendar year's heatmap columns", () => {
    expect(heatmapWeek("2021-01-01")).toBe(0);
    expect(heatmapWeek("2022-01-01")).toBe(0);
    expect(heatmapWeek("2024-12-30")).toBe(53);
    expect(heatmapWeek("2024-06-15")).toBe(24);
  });

  it("fills every day of the year in the heatmap", () => {
    const cells = computeYearHeatmap([day("2024-01-01", 600)], 2024);

    expect(cells).toHaveLength(366);
    expect(cells[0]).toEqual({ date: "2024-01-01", seconds: 600, weekday: 1, week: 1 });
    expect(cells[1].seconds).toBe(0);
  });

  it("compares the latest window with the one before it", () => {
    const records = consecutive("2024-01-01", [60, 60, 60, 60, 60, 60, 60, 120, 120, 120, 120, 120, 120, 120]);

    expect(computeWindowComparison(records, 7)).toEqual({
      window: 7,
      recentTotalSeconds: 840,
      previousTotalSeconds: 420,
      changeSeconds: 420,
      recentAverageSeconds: 120,
      deltaVsOverallSeconds: 30
    });
  });

  it("treats a missing previous window as zero", () => {
    const comparison = computeWindowComparison(consecutive("2024-01-01", Array.from({ length: 10 }, () => 60)), 7);

    expect(comparison.previousTotalSeconds).toBe(0);
    expect(comparison.changeSeconds).toBe(420);
    expect(comparison.deltaVsOverallSeconds).toBe(0);
  });

  it("ranks the best days and breaks ties by date", () => {
    const records = consecutive("2024-01-01", [100, 300, 300, 50, 200, 400]);

    expect(computeBestDays(records).map((entry) => entry.date)).toEqual([
      "2024-01-06",
      "2024-01-02",
      "2024-01-03",
      "2024-01-05",
      "2024-01-01"
    ]);
    expect(computeBestDays(records.slice(0, 4))).toEqual([]);
  });

  it("sums today's seconds", () => {
    expect(computeTodaySeconds([day("2024-01-01", 60), day("2024-01-02", 90)], "2024-01-02")).toBe(90);
    expect(computeTodaySeconds([day("2024-01-01", 60)], "2024-01-03")).toBe(0);
  });
});

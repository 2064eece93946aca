import { describe, expect, it } from "vitest";

import {
  buildForecast,
  computeMilestoneProgress,
  daysToReach,
  generateFutureCurve,
  projectMilestones,
  resolveTargetMilestone,
  selectUpcomingMilestones
} from "@/lib/domain/forecast-engine";
import { buildProgressContext } from "@/lib/domain/progress-context";

// 30h before tracking, then 10h on each of two days: 40h and 50h.
const context = buildProgressContext(
  {
    records: [
      { date: "2024-01-01", timeSeconds: 36000, goalReached: false },
      { date: "2024-01-02", timeSeconds: 36000, goalReached: true }
    ],
    initialTimeSeconds: 108000,
    dailyGoalSeconds: 72000
  },
  { today: "2024-01-02" }
);

describe("forecast engine", () => {
  it("computes days to a milestone from a daily rate", () => {
    expect(daysToReach(45, 50, 3600)).toBe(5);
    expect(daysToReach(45, 50, 0)).toBe(Number.POSITIVE_INFINITY);
    expect(daysToReach(45, 50, Number.NaN)).toBe(Number.POSITIVE_INFINITY);
  });

  it("projects predicted dates by flooring the day count", () => {
    expect(projectMilestones(45, "2024-01-10", 3600, [150, 50])).toEqual([
      { milestone: 50, status: "projected", daysToReach: 5, predictedDate: "2024-01-15" },
      { milestone: 150, status: "projected", daysToReach: 105, predictedDate: "2024-04-24" }
    ]);
  });

  it("marks achieved and unreachable milestones", () => {
    expect(projectMilestones(60, "2024-01-10", 0, [50, 150])).toEqual([
      { milestone: 50, status: "achieved" },
      { milestone: 150, status: "unreachable", daysToReach: Number.POSITIVE_INFINITY }
    ]);
  });

  it("treats milestones past the forecast horizon as unreachable", () => {
    expect(projectMilestones(0, "2024-01-01", 0.5, [1500])).toEqual([
      { milestone: 1500, status: "unreachable", daysToReach: 10800000 }
    ]);
    expect(projectMilestones(0, "2024-01-01", 3600, [7305, 7306])).toEqual([
      { milestone: 7305, status: "projected", daysToReach: 7305, predictedDate: "2044-01-01" },
      { milestone: 7306, status: "unreachable", daysToReach: 7306 }
    ]);
  });

  it("extends the curve until the target is reached", () => {
    expect(generateFutureCurve("2024-01-10", 45, 3600, 47)).toEqual([
      { date: "2024-01-11", cumulativeHours: 46 },
      { date: "2024-01-12", cumulativeHours: 47 }
    ]);
  });

  it("returns one step when already at the target", () => {
    expect(generateFutureCurve("2024-01-10", 50, 3600, 50)).toEqual([{ date: "2024-01-11", cumulativeHours: 51 }]);
  });

  it("returns no curve without a positive rate and caps long curves", () => {
    expect(generateFutureCurve("2024-01-10", 45, 0, 50)).toEqual([]);
    expect(generateFutureCurve("2024-01-01", 0, 1, 1500, 10)).toHaveLength(10);
  });

  it("selects up to three upcoming milestones and the projection target", () => {
    expect(selectUpcomingMilestones(45)).toEqual([50, 150, 300]);
    expect(selectUpcomingMilestones(700)).toEqual([1000, 1500]);
    expect(resolveTargetMilestone(45)).toBe(300);
    expect(resolveTargetMilestone(700)).toBe(1500);
    expect(resolveTargetMilestone(2000)).toBe(1500);
    expect(resolveTargetMilestone(10, [])).toBeNull();
  });

  it("reports progress toward unmet milestones", () => {
    expect(computeMilestoneProgress(75, [50, 150, 300])).toEqual([
      { milestone: 150, percent: 50 },
      { milestone: 300, percent: 25 }
    ]);
  });

  it("builds curves, markers and table rows from a context", () => {
    const forecast = buildForecast(context);

    expect(forecast.rates).toEqual({ overall: 36000, sevenDay: 36000, thirtyDay: 36000 });
    expect(forecast.targetMilestone).toBe(600);
    expect(forecast.upcomingMilestones).toEqual([150, 300, 600]);
    expect(forecast.curves.overall).toHaveLength(55);
    expect(forecast.curves.overall.at(-1)).toEqual({ date: "2024-02-26", cumulativeHours: 600 });
    expect(forecast.markers).toEqual([
      { milestone: 50, date: "2024-01-02", source: "history" },
      { milestone: 150, date: "2024-01-12", source: "projection" },
      { milestone: 300, date: "2024-01-27", source: "projection" },
      { milestone: 600, date: "2024-02-26", source: "projection" }
    ]);
    expect(forecast.milestones[0]).toEqual({
      milestone: 50,
      achieved: true,
      byBasis: {
        overall: { milestone: 50, status: "achieved" },
        sevenDay: { milestone: 50, status: "achieved" },
        thirtyDay: { milestone: 50, status: "achieved" }
      }
    });
    expect(forecast.milestones[1].byBasis.sevenDay).toEqual({
      milestone: 150,
      status: "projected",
      daysToReach: 10,
      predictedDate: "2024-01-12"
    });
    expect(forecast.progress.map((item) => item.milestone)).toEqual([150, 300, 600, 1000, 1500]);
  });

  it("returns an empty forecast without records", () => {
    const empty = buildProgressContext({ records: [], initialTimeSeconds: 0, dailyGoalSeconds: 1800 }, { today: "2024-01-02" });
    const forecast = buildForecast(empty);

    expect(forecast.targetMilestone).toBeNull();
    expect(forecast.curves).toEqual({ overall: [], sevenDay: [], thirtyDay: [] });
    expect(forecast.milestones).toEqual([]);
    expect(forecast.markers).toEqual([]);
  });
});

import { describe, expect, it, vi } from "vitest";

import { buildProgressContext, reloadProgressContext } from "@/lib/domain/progress-context";
import type { ProgressSeriesLoader } from "@/lib/domain/progress-context";

describe("progress context", () => {
  it("normalizes records and clamps a negative initial time", () => {
    const context = buildProgressContext(
      {
        records: [
          { date: "2024-01-02", timeSeconds: 600, goalReached: false },
          { date: "2024-01-01", timeSeconds: 1200, goalReached: true }
        ],
        initialTimeSeconds: -5,
        dailyGoalSeconds: 1800
      },
      { today: "2024-01-02" }
    );

    expect(context.initialTimeSeconds).toBe(0);
    expect(context.records.map((record) => record.date)).toEqual(["2024-01-01", "2024-01-02"]);
    expect(context.derived.map((entry) => entry.cumulativeSeconds)).toEqual([1200, 1800]);
    expect(context.summary.todaySeconds).toBe(600);
    expect(context.summary.lastDate).toBe("2024-01-02");
  });

  it("rebuilds from a fresh load on every reload", async () => {
    const loadSeries = vi
      .fn<ProgressSeriesLoader["loadSeries"]>()
      .mockResolvedValueOnce({ records: [], initialTimeSeconds: 0, dailyGoalSeconds: 1800 })
      .mockResolvedValueOnce({
        records: [{ date: "2024-01-01", timeSeconds: 3600, goalReached: true }],
        initialTimeSeconds: 0,
        dailyGoalSeconds: 1800
      });
    const loader: ProgressSeriesLoader = { loadSeries };

    const first = await reloadProgressContext(loader, "test-token", { today: "2024-01-01" });
    const second = await reloadProgressContext(loader, "test-token", { today: "2024-01-01" });

    expect(loadSeries).toHaveBeenCalledWith("test-token");
    expect(first.summary.totalDays).toBe(0);
    expect(second.summary.currentHours).toBe(1);
    expect(second.summary.goals.goalsReached).toBe(1);
  });
});

import type {
  AveragedInsightsTab,
  BestDayRow,
  ChartModel,
  ChartTrace,
  DailyGoalModel,
  DashboardSeriesPoint,
  DashboardVisualModel,
  MilestoneTableRow,
  ProgressOverviewItem,
  ProjectedGrowthModel,
  Scorecard,
  YearHeatmapModel
} from "@/types/dashboard";
import type { MilestoneProjection, ProgressContext, ProgressForecast } from "@/types/progress";
import { COLOUR_PALETTE, SECONDS_PER_MINUTE, milestoneColour } from "@/lib/domain/constants";
import { buildForecast } from "@/lib/domain/forecast-engine";
import {
  computeBestDays,
  computeDayOfWeekAverages,
  computeMonthlyBreakdown,
  computeWindowComparison,
  computeYearHeatmap
} from "@/lib/domain/metrics-engine";

/** Palette lookup by trace name, so the same series keeps its colour across charts. */
export const TRACE_COLOURS: Record<string, string> = {
  "Historical Data": COLOUR_PALETTE.primary,
  "Predicted (Overall Avg)": COLOUR_PALETTE.primary,
  "Predicted (7-Day Avg)": COLOUR_PALETTE["7day_avg"],
  "Predicted (30-Day Avg)": COLOUR_PALETTE["30day_avg"],
  "Daily Minutes": COLOUR_PALETTE.primary,
  "7-day Average": COLOUR_PALETTE["7day_avg"],
  "30-day Average": COLOUR_PALETTE["30day_avg"],
  "Overall Average": COLOUR_PALETTE.primary,
  "Days Target Met": COLOUR_PALETTE["7day_avg"],
  "Days Practiced (> 0 mins)": COLOUR_PALETTE.primary,
  "Tracked Days in Month": COLOUR_PALETTE["30day_avg"],
  "Average Minutes": COLOUR_PALETTE.primary
};

function toMinutes(seconds: number): number {
  return seconds / SECONDS_PER_MINUTE;
}

export function formatSigned(value: number, digits: number): string {
  const fixed = value.toFixed(digits);
  return value >= 0 ? `+${fixed}` : fixed;
}

export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = seconds % 60;
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${pad(hours)} hours ${pad(minutes)} minutes ${pad(rest)} seconds`;
}

function scorecard(label: string, value: string, delta: string | null = null, deltaTone: Scorecard["deltaTone"] = "signed"): Scorecard {
  return { label, value, delta, deltaTone };
}

function trace(
  name: string,
  kind: ChartTrace["kind"],
  points: DashboardSeriesPoint[],
  style: Partial<Pick<ChartTrace, "dash" | "opacity">> = {}
): ChartTrace {
  return {
    name,
    kind,
    colour: TRACE_COLOURS[name] ?? COLOUR_PALETTE.primary,
    dash: style.dash ?? "solid",
    opacity: style.opacity ?? 1,
    points
  };
}

export function buildBasicStats(context: ProgressContext): Scorecard[] {
  const { summary, initialTimeSeconds } = context;
  return [
    scorecard("Minutes Watched Today", toMinutes(summary.todaySeconds).toFixed(1)),
    scorecard("Current Streak", `${summary.streaks.currentStreak} days`),
    scorecard(
      "Total Hours Watched",
      summary.currentHours.toFixed(1),
      initialTimeSeconds > 0 ? `including ${toMinutes(initialTimeSeconds).toFixed(0)} min initial time` : null
    ),
    scorecard("Average Minutes/Day", toMinutes(summary.averageSecondsPerDay).toFixed(1))
  ];
}

export function buildDailyGoal(context: ProgressContext): DailyGoalModel {
  const watched = context.summary.todaySeconds;
  const goal = context.dailyGoalSeconds;
  const ratio = goal > 0 ? watched / goal : 0;

  return {
    fraction: Math.min(Math.max(ratio, 0), 1),
    statusText: `${Math.floor(watched / 60)} / ${Math.floor(goal / 60)} mins (${(ratio * 100).toFixed(2)}%)`
  };
}

export function buildProjectedGrowth(context: ProgressContext, forecast: ProgressForecast): ProjectedGrowthModel {
  const curvePoints = (basis: keyof ProgressForecast["curves"]): DashboardSeriesPoint[] =>
    forecast.curves[basis].map((point) => ({ x: point.date, y: point.cumulativeHours }));

  return {
    chart: {
      title: "Projected Growth",
      xTitle: "Date",
      yTitle: "Cumulative Hours",
      traces: [
        trace(
          "Historical Data",
          "line",
          context.derived.map((day) => ({ x: day.date, y: day.cumulativeHours }))
        ),
        trace("Predicted (Overall Avg)", "line", curvePoints("overall"), { dash: "dash", opacity: 0.5 }),
        trace("Predicted (7-Day Avg)", "line", curvePoints("sevenDay"), { dash: "dot", opacity: 0.5 }),
        trace("Predicted (30-Day Avg)", "line", curvePoints("thirtyDay"), { dash: "dot", opacity: 0.5 })
      ]
    },
    markers: forecast.markers.map((marker) => ({
      milestone: marker.milestone,
      label: `${marker.milestone} Hours`,
      date: marker.date,
      colour: milestoneColour(marker.milestone),
      source: marker.source
    })),
    targetMilestone: forecast.targetMilestone
  };
}

export function buildMovingAverages(context: ProgressContext): ChartModel {
  const { derived } = context;
  return {
    title: "Daily Minutes with Moving Averages",
    xTitle: "Date",
    yTitle: "Minutes Watched",
    traces: [
      trace("Daily Minutes", "markers", derived.map((day) => ({ x: day.date, y: toMinutes(day.timeSeconds) }))),
      trace("7-day Average", "line", derived.map((day) => ({ x: day.date, y: toMinutes(day.rollingAvg7) }))),
      trace("30-day Average", "line", derived.map((day) => ({ x: day.date, y: toMinutes(day.rollingAvg30) }))),
      trace("Overall Average", "line", derived.map((day) => ({ x: day.date, y: toMinutes(day.cumulativeAvg) })), {
        dash: "dash"
      })
    ]
  };
}

export function buildDailyBreakdown(context: ProgressContext): ChartModel {
  const average = toMinutes(context.summary.averageSecondsPerDay);
  return {
    title: "Daily Minutes Watched",
    xTitle: "Date",
    yTitle: "Minutes Watched",
    traces: [
      trace("Daily Minutes", "bar", context.derived.map((day) => ({ x: day.date, y: toMinutes(day.timeSeconds) }))),
      trace("Overall Average", "line", context.derived.map((day) => ({ x: day.date, y: average })), { dash: "dash" })
    ]
  };
}

export function buildMonthlyBreakdown(context: ProgressContext): ChartModel {
  const rows = computeMonthlyBreakdown(context.records, context.today);
  return {
    title: "Monthly Breakdown of Practice and Goals",
    xTitle: "Month",
    yTitle: "Number of Days",
    traces: [
      trace("Days Target Met", "bar", rows.map((row) => ({ x: row.month, y: row.daysGoalMet }))),
      trace("Days Practiced (> 0 mins)", "bar", rows.map((row) => ({ x: row.month, y: row.daysPracticed }))),
      trace("Tracked Days in Month", "bar", rows.map((row) => ({ x: row.month, y: row.daysInPeriod })))
    ]
  };
}

export function buildYearHeatmap(context: ProgressContext, year: number = Number(context.today.slice(0, 4))): YearHeatmapModel {
  const cells = computeYearHeatmap(context.records, year).map((cell) => ({
    date: cell.date,
    week: cell.week,
    weekday: cell.weekday,
    minutes: toMinutes(cell.seconds)
  }));

  return {
    year,
    cells,
    maxMinutes: cells.reduce((max, cell) => Math.max(max, cell.minutes), 0)
  };
}

export function buildDaysOfWeek(context: ProgressContext): ChartModel {
  return {
    title: "Average Minutes Watched per Day of Week",
    xTitle: "Day of Week",
    yTitle: "Minutes",
    traces: [
      trace(
        "Average Minutes",
        "bar",
        computeDayOfWeekAverages(context.records).map((entry) => ({ x: entry.weekday, y: toMinutes(entry.averageSeconds) }))
      )
    ]
  };
}

function formatProjectionCell(projection: MilestoneProjection): string | null {
  if (projection.status === "achieved") {
    return null;
  }
  if (projection.status === "unreachable") {
    return "Not reachable at this pace";
  }
  return `${projection.predictedDate} (${projection.daysToReach.toFixed(0)}d)`;
}

export function buildMilestoneTable(forecast: ProgressForecast): MilestoneTableRow[] {
  return forecast.milestones.map((row) => ({
    milestone: row.milestone,
    milestoneLabel: `${row.milestone}h`,
    achieved: row.achieved,
    overall: formatProjectionCell(row.byBasis.overall),
    sevenDay: formatProjectionCell(row.byBasis.sevenDay),
    thirtyDay: formatProjectionCell(row.byBasis.thirtyDay)
  }));
}

export function buildProgressOverview(forecast: ProgressForecast): ProgressOverviewItem[] {
  return forecast.progress.map((item) => ({
    milestone: item.milestone,
    fraction: Math.min(Math.max(item.percent / 100, 0), 1),
    label: `Progress to ${item.milestone} hours: ${item.percent.toFixed(1)}%`
  }));
}

export function buildInsights(context: ProgressContext): Scorecard[] {
  const { streaks, goals, consistency } = context.summary;
  return [
    scorecard("Longest Streak", `${streaks.longestStreak} days`),
    scorecard("Consistency", `${consistency.percentage.toFixed(1)}%`, `${consistency.daysWatched} of ${consistency.totalDays} days`),
    scorecard("Current Streak", `${streaks.currentStreak} days`),
    scorecard("Goal Streak", `${goals.currentGoalStreak} days`, `Best: ${goals.longestGoalStreak} days`),
    scorecard("Average Streak", `${streaks.averageStreak.toFixed(1)} days`, `Best: ${streaks.longestStreak} days`),
    scorecard("Goal Achievement", `${goals.goalsReached} days`, `${goals.goalRate.toFixed(1)}% of days`)
  ];
}

export function buildBestDays(context: ProgressContext): BestDayRow[] {
  return computeBestDays(context.records).map((day) => ({
    day: day.date,
    timeSpent: formatDuration(day.timeSeconds),
    minutes: Math.round((day.timeSeconds / 60) * 100) / 100
  }));
}

export function buildAveragedInsights(context: ProgressContext): AveragedInsightsTab[] {
  const week = computeWindowComparison(context.records, 7);
  const month = computeWindowComparison(context.records, 30);
  const { summary } = context;

  return [
    {
      key: "7days",
      label: "7 days",
      scorecards: [
        scorecard(
          "Last 7 Days Total",
          `${toMinutes(week.recentTotalSeconds).toFixed(0)} min`,
          `${formatSigned(toMinutes(week.changeSeconds), 0)} min vs previous week`
        ),
        scorecard(
          "7-Day Average",
          `${toMinutes(week.recentAverageSeconds).toFixed(1)} min/day`,
          `${formatSigned(toMinutes(week.deltaVsOverallSeconds), 1)} vs overall`
        )
      ]
    },
    {
      key: "30days",
      label: "30 days",
      scorecards: [
        scorecard(
          "Last 30 Days Total",
          `${toMinutes(month.recentTotalSeconds).toFixed(0)} min`,
          `${formatSigned(toMinutes(month.changeSeconds), 0)} min vs previous 30 days`
        ),
        scorecard(
          "30-Day Average",
          `${toMinutes(month.recentAverageSeconds).toFixed(1)} min/day`,
          `${formatSigned(toMinutes(month.deltaVsOverallSeconds), 1)} vs overall`
        )
      ]
    },
    {
      key: "allTime",
      label: "All Time",
      scorecards: [
        scorecard(
          "All Time Total",
          `${toMinutes(summary.totalSeconds).toFixed(0)} min`,
          `${summary.milestonesReached} milestones reached`,
          "off"
        ),
        scorecard("All Time Average", `${toMinutes(summary.averageSecondsPerDay).toFixed(1)} min/day`)
      ]
    }
  ];
}

export function buildDashboardVisualModel(context: ProgressContext): DashboardVisualModel {
  const forecast = buildForecast(context);
  const { firstDate, lastDate } = context.summary;

  return {
    hasData: context.records.length > 0,
    basicStats: buildBasicStats(context),
    dailyGoal: buildDailyGoal(context),
    projectedGrowth: buildProjectedGrowth(context, forecast),
    movingAverages: buildMovingAverages(context),
    dailyBreakdown: buildDailyBreakdown(context),
    monthlyBreakdown: buildMonthlyBreakdown(context),
    yearHeatmap: buildYearHeatmap(context),
    daysOfWeek: buildDaysOfWeek(context),
    milestoneTable: buildMilestoneTable(forecast),
    progressOverview: buildProgressOverview(forecast),
    insights: buildInsights(context),
    bestDays: buildBestDays(context),
    averagedInsights: buildAveragedInsights(context),
    dataRangeLabel: firstDate && lastDate ? `Data range: ${firstDate} to ${lastDate}` : null
  };
}

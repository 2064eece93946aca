export interface Scorecard {
  label: string;
  value: string;
  delta: string | null;
  /** `off` renders the delta without up/down colouring. */
  deltaTone: "signed" | "off";
}

export interface DashboardSeriesPoint {
  x: string;
  y: number;
}

export type ChartTraceKind = "line" | "bar" | "markers";

export interface ChartTrace {
  name: string;
  kind: ChartTraceKind;
  colour: string;
  dash: "solid" | "dash" | "dot";
  opacity: number;
  points: DashboardSeriesPoint[];
}

export interface ChartModel {
  title: string;
  xTitle: string;
  yTitle: string;
  traces: ChartTrace[];
}

export interface MilestoneMarkerModel {
  milestone: number;
  label: string;
  date: string;
  colour: string;
  source: "history" | "projection";
}

export interface ProjectedGrowthModel {
  chart: ChartModel;
  markers: MilestoneMarkerModel[];
  targetMilestone: number | null;
}

export interface DashboardHeatmapCell {
  date: string;
  week: number;
  weekday: number;
  minutes: number;
}

export interface YearHeatmapModel {
  year: number;
  cells: DashboardHeatmapCell[];
  maxMinutes: number;
}

export interface MilestoneTableRow {
  milestone: number;
  milestoneLabel: string;
  achieved: boolean;
  overall: string | null;
  sevenDay: string | null;
  thirtyDay: string | null;
}

export interface ProgressOverviewItem {
  milestone: number;
  /** 0..1 */
  fraction: number;
  label: string;
}

export interface BestDayRow {
  day: string;
  timeSpent: string;
  minutes: number;
}

export interface AveragedInsightsTab {
  key: "7days" | "30days" | "allTime";
  label: string;
  scorecards: Scorecard[];
}

export interface DailyGoalModel {
  /** Clamped to 0..1 for the bar. */
  fraction: number;
  statusText: string;
}

export interface DashboardVisualModel {
  hasData: boolean;
  basicStats: Scorecard[];
  dailyGoal: DailyGoalModel;
  projectedGrowth: ProjectedGrowthModel;
  movingAverages: ChartModel;
  dailyBreakdown: ChartModel;
  monthlyBreakdown: ChartModel;
  yearHeatmap: YearHeatmapModel;
  daysOfWeek: ChartModel;
  milestoneTable: MilestoneTableRow[];
  progressOverview: ProgressOverviewItem[];
  insights: Scorecard[];
  bestDays: BestDayRow[];
  averagedInsights: AveragedInsightsTab[];
  dataRangeLabel: string | null;
}

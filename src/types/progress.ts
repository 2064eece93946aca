/** Calendar date in `YYYY-MM-DD` form, no time component. */
export type IsoDate = string;

export interface DailyRecord {
  date: IsoDate;
  timeSeconds: number;
  goalReached: boolean;
}

export interface ProgressSeriesInput {
  records: DailyRecord[];
  initialTimeSeconds: number;
  dailyGoalSeconds: number;
}

export interface DerivedDay {
  date: IsoDate;
  timeSeconds: number;
  goalReached: boolean;
  cumulativeSeconds: number;
  cumulativeMinutes: number;
  cumulativeHours: number;
  isActive: boolean;
  streakRunLength: number;
  rollingAvg7: number;
  rollingAvg30: number;
  cumulativeAvg: number;
}

export interface StreakStats {
  runLengths: number[];
  currentStreak: number;
  longestStreak: number;
  averageStreak: number;
}

export interface GoalStats {
  currentGoalStreak: number;
  longestGoalStreak: number;
  goalsReached: number;
  totalDays: number;
  goalRate: number;
}

export interface ConsistencyStats {
  percentage: number;
  daysWatched: number;
  totalDays: number;
}

export type WeekdayName = "Monday" | "Tuesday" | "Wednesday" | "Thursday" | "Friday" | "Saturday" | "Sunday";

export interface WeekdayAverage {
  weekday: WeekdayName;
  averageSeconds: number;
  days: number;
}

export interface MonthlyBreakdownRow {
  /** `YYYY-MM` */
  month: string;
  daysPracticed: number;
  daysGoalMet: number;
  daysInPeriod: number;
}

export interface YearHeatmapCell {
  date: IsoDate;
  seconds: number;
  /** ISO weekday, 1 = Monday. */
  weekday: number;
  /** Week column on a single contiguous axis for the calendar year. */
  week: number;
}

export interface WindowComparison {
  window: number;
  recentTotalSeconds: number;
  previousTotalSeconds: number;
  changeSeconds: number;
  recentAverageSeconds: number;
  deltaVsOverallSeconds: number;
}

export interface BestDay {
  date: IsoDate;
  timeSeconds: number;
}

export interface ProgressSummary {
  totalDays: number;
  totalSeconds: number;
  currentHours: number;
  averageSecondsPerDay: number;
  current7DayAverage: number;
  current30DayAverage: number;
  todaySeconds: number;
  firstDate: IsoDate | null;
  lastDate: IsoDate | null;
  streaks: Omit<StreakStats, "runLengths">;
  goals: GoalStats;
  consistency: ConsistencyStats;
  milestonesReached: number;
}

export interface ProgressContext {
  records: DailyRecord[];
  initialTimeSeconds: number;
  dailyGoalSeconds: number;
  today: IsoDate;
  derived: DerivedDay[];
  summary: ProgressSummary;
}

export type RateBasis = "overall" | "sevenDay" | "thirtyDay";

export type MilestoneProjection =
  | { milestone: number; status: "achieved" }
  | { milestone: number; status: "projected"; daysToReach: number; predictedDate: IsoDate }
  | { milestone: number; status: "unreachable"; daysToReach: number };

export interface MilestoneForecastRow {
  milestone: number;
  achieved: boolean;
  byBasis: Record<RateBasis, MilestoneProjection>;
}

export interface FutureCurvePoint {
  date: IsoDate;
  cumulativeHours: number;
}

export interface MilestoneMarker {
  milestone: number;
  date: IsoDate;
  source: "history" | "projection";
}

export interface MilestoneProgress {
  milestone: number;
  percent: number;
}

export interface ProgressForecast {
  rates: Record<RateBasis, number>;
  targetMilestone: number | null;
  upcomingMilestones: number[];
  curves: Record<RateBasis, FutureCurvePoint[]>;
  milestones: MilestoneForecastRow[];
  markers: MilestoneMarker[];
  progress: MilestoneProgress[];
}

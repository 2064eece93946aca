import type { DerivedDay } from "@/types/progress";

export const CSV_EXPORT_FILENAME = "immersion_progress.csv";

export const CSV_COLUMNS = [
  "date",
  "seconds",
  "goalReached",
  "cumulative_seconds",
  "cumulative_minutes",
  "cumulative_hours",
  "streak",
  "current_streak",
  "7day_avg",
  "30day_avg",
  "cumulative_avg"
] as const;

function escapeCsvValue(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toCells(day: DerivedDay): string[] {
  return [
    day.date,
    String(day.timeSeconds),
    day.goalReached ? "True" : "False",
    String(day.cumulativeSeconds),
    String(day.cumulativeMinutes),
    String(day.cumulativeHours),
    day.isActive ? "1" : "0",
    String(day.streakRunLength),
    String(day.rollingAvg7),
    String(day.rollingAvg30),
    String(day.cumulativeAvg)
  ];
}

export function buildDerivedSeriesCsv(derived: DerivedDay[]): string {
  const lines = [CSV_COLUMNS.join(","), ...derived.map((day) => toCells(day).map(escapeCsvValue).join(","))];
  return `${lines.join("\n")}\n`;
}

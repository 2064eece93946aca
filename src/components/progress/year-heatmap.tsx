"use client";

import type { YearHeatmapModel } from "@/types/dashboard";

const WEEKDAY_LABELS = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"] as const;

interface YearHeatmapProps {
  model: YearHeatmapModel;
}

function intensityClass(minutes: number, maxMinutes: number): string {
  if (minutes <= 0 || maxMinutes <= 0) return "heatmap-cell-0";
  const ratio = minutes / maxMinutes;
  if (ratio < 0.25) return "heatmap-cell-1";
  if (ratio < 0.5) return "heatmap-cell-2";
  if (ratio < 0.75) return "heatmap-cell-3";
  return "heatmap-cell-4";
}

export function YearHeatmap({ model }: YearHeatmapProps) {
  const weeks = model.cells.map((cell) => cell.week);
  const firstWeek = weeks.length > 0 ? Math.min(...weeks) : 1;
  const lastWeek = weeks.length > 0 ? Math.max(...weeks) : 1;

  return (
    <div className="year-heatmap" role="img" aria-label={`Yearly activity heatmap for ${model.year}`}>
      <div className="year-heatmap-labels">
        {WEEKDAY_LABELS.map((label) => (
          <span key={label}>{label}</span>
        ))}
      </div>
      <div
        className="year-heatmap-grid"
        style={{ gridTemplateColumns: `repeat(${lastWeek - firstWeek + 1}, 12px)`, gridTemplateRows: "repeat(7, 12px)" }}
      >
        {model.cells.map((cell) => (
          <span
            key={cell.date}
            className={`year-heatmap-cell ${intensityClass(cell.minutes, model.maxMinutes)}`}
            style={{ gridColumn: cell.week - firstWeek + 1, gridRow: cell.weekday }}
            title={`Date: ${cell.date} · Minutes: ${cell.minutes.toFixed(1)}`}
          />
        ))}
      </div>
    </div>
  );
}

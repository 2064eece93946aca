"use client";

import { useMemo } from "react";
import { Chart } from "react-chartjs-2";
import {
  BarController,
  BarElement,
  CategoryScale,
  Chart as ChartJS,
  Legend,
  LineController,
  LineElement,
  LinearScale,
  PointElement,
  Tooltip,
  type ChartData,
  type ChartDataset,
  type ChartOptions
} from "chart.js";

import type { ChartModel, ChartTrace } from "@/types/dashboard";

ChartJS.register(CategoryScale, LinearScale, BarController, BarElement, LineController, LineElement, PointElement, Tooltip, Legend);

type MixedType = "bar" | "line";
type MixedData = Array<number | null>;

interface TraceChartProps {
  model: ChartModel;
  height?: number;
  emptyCopy?: string;
}

function hexWithOpacity(hex: string, opacity: number): string {
  const match = hex.match(/^#([0-9a-f]{6})$/i);
  if (!match) {
    return hex;
  }
  const value = Number.parseInt(match[1], 16);
  return `rgba(${(value >> 16) & 255}, ${(value >> 8) & 255}, ${value & 255}, ${opacity})`;
}

function dashPattern(dash: ChartTrace["dash"]): number[] {
  if (dash === "dash") return [8, 6];
  if (dash === "dot") return [2, 4];
  return [];
}

export function collectLabels(traces: ChartTrace[]): string[] {
  const labels = new Set<string>();
  for (const trace of traces) {
    for (const point of trace.points) {
      labels.add(point.x);
    }
  }
  return [...labels];
}

function toDataset(trace: ChartTrace, labels: string[]): ChartDataset<MixedType, MixedData> {
  const byLabel = new Map(trace.points.map((point) => [point.x, point.y]));
  const data = labels.map((label) => byLabel.get(label) ?? null);
  const colour = hexWithOpacity(trace.colour, trace.opacity);

  if (trace.kind === "bar") {
    return {
      type: "bar",
      label: trace.name,
      data,
      backgroundColor: colour
    };
  }

  return {
    type: "line",
    label: trace.name,
    data,
    borderColor: colour,
    backgroundColor: colour,
    borderDash: dashPattern(trace.dash),
    showLine: trace.kind === "line",
    pointRadius: trace.kind === "markers" ? 3 : 0,
    spanGaps: true,
    tension: 0.2
  };
}

export function TraceChart({ model, height = 360, emptyCopy = "No data to display yet." }: TraceChartProps) {
  const hasPoints = model.traces.some((trace) => trace.points.length > 0);

  const chartData = useMemo<ChartData<MixedType, MixedData, string>>(() => {
    const labels = collectLabels(model.traces);
    return {
      labels,
      datasets: model.traces.map((trace) => toDataset(trace, labels))
    };
  }, [model.traces]);

  const options = useMemo<ChartOptions<MixedType>>(
    () => ({
      responsive: true,
      maintainAspectRatio: false,
      plugins: {
        legend: { position: "bottom" }
      },
      scales: {
        x: { title: { display: true, text: model.xTitle } },
        y: { title: { display: true, text: model.yTitle }, beginAtZero: true }
      }
    }),
    [model.xTitle, model.yTitle]
  );

  return (
    <div className="chart-surface" style={{ height }}>
      {hasPoints ? (
        <Chart<MixedType, MixedData, string> type="bar" aria-label={model.title} data={chartData} options={options} />
      ) : (
        <p className="empty-copy">{emptyCopy}</p>
      )}
    </div>
  );
}

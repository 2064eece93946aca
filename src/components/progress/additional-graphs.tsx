"use client";

import { useState } from "react";

import { SurfaceCard } from "@/components/progress/surface-card";
import { SectionTitle } from "@/components/progress/section-title";
import { TraceChart } from "@/components/progress/trace-chart";
import { YearHeatmap } from "@/components/progress/year-heatmap";
import type { DashboardVisualModel } from "@/types/dashboard";

type GraphTab = "moving" | "daily" | "monthly" | "heatmap" | "weekday";

const TABS: Array<{ key: GraphTab; label: string }> = [
  { key: "moving", label: "Moving Averages" },
  { key: "daily", label: "Daily Breakdown" },
  { key: "monthly", label: "Monthly Breakdown" },
  { key: "heatmap", label: "Yearly Heatmap" },
  { key: "weekday", label: "Days of Week" }
];

export function AdditionalGraphs({ model }: { model: DashboardVisualModel }) {
  const [activeTab, setActiveTab] = useState<GraphTab>("moving");

  return (
    <SurfaceCard>
      <SectionTitle title="Additional Graphs" />
      <nav className="tab-row" aria-label="Additional graphs">
        {TABS.map((tab) => (
          <button
            key={tab.key}
            type="button"
            className={tab.key === activeTab ? "tab-button tab-button-active" : "tab-button"}
            onClick={() => setActiveTab(tab.key)}
          >
            {tab.label}
          </button>
        ))}
      </nav>

      {activeTab === "moving" ? <TraceChart model={model.movingAverages} height={400} /> : null}
      {activeTab === "daily" ? <TraceChart model={model.dailyBreakdown} /> : null}
      {activeTab === "monthly" ? <TraceChart model={model.monthlyBreakdown} height={500} /> : null}
      {activeTab === "heatmap" ? <YearHeatmap model={model.yearHeatmap} /> : null}
      {activeTab === "weekday" ? <TraceChart model={model.daysOfWeek} /> : null}
    </SurfaceCard>
  );
}

"use client";

import { useState } from "react";

import { ScorecardGrid } from "@/components/progress/metric-card";
import { SurfaceCard } from "@/components/progress/surface-card";
import { SectionTitle } from "@/components/progress/section-title";
import type { AveragedInsightsTab } from "@/types/dashboard";

export function AveragedInsights({ tabs }: { tabs: AveragedInsightsTab[] }) {
  const [activeKey, setActiveKey] = useState<AveragedInsightsTab["key"]>("7days");
  const active = tabs.find((tab) => tab.key === activeKey) ?? tabs[0];

  return (
    <SurfaceCard>
      <SectionTitle title="Averaged Insights" />
      <nav className="tab-row" aria-label="Averaged insights">
        {tabs.map((tab) => (
          <button
            key={tab.key}
            type="button"
            className={tab.key === activeKey ? "tab-button tab-button-active" : "tab-button"}
            onClick={() => setActiveKey(tab.key)}
          >
            {tab.label}
          </button>
        ))}
      </nav>
      {active ? <ScorecardGrid scorecards={active.scorecards} columns={2} /> : null}
    </SurfaceCard>
  );
}

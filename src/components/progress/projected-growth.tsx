"use client";

import { SurfaceCard } from "@/components/progress/surface-card";
import { SectionTitle } from "@/components/progress/section-title";
import { TraceChart } from "@/components/progress/trace-chart";
import type { ProjectedGrowthModel } from "@/types/dashboard";

export function ProjectedGrowth({ model }: { model: ProjectedGrowthModel }) {
  return (
    <SurfaceCard>
      <SectionTitle
        title="Projected Growth"
        subtitle={model.targetMilestone !== null ? `Projected up to ${model.targetMilestone} hours` : undefined}
      />
      <TraceChart model={model.chart} height={600} />
      {model.markers.length > 0 ? (
        <ul className="milestone-markers">
          {model.markers.map((marker) => (
            <li key={marker.milestone} style={{ color: marker.colour }}>
              {marker.label}: {marker.date}
              {marker.source === "projection" ? " (projected)" : null}
            </li>
          ))}
        </ul>
      ) : null}
    </SurfaceCard>
  );
}

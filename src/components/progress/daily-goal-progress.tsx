import { Target } from "lucide-react";

import { SurfaceCard } from "@/components/progress/surface-card";
import { SectionTitle } from "@/components/progress/section-title";
import type { DailyGoalModel } from "@/types/dashboard";

export function DailyGoalProgress({ model }: { model: DailyGoalModel }) {
  return (
    <SurfaceCard soft>
      <SectionTitle title="Daily Goal Progress" rightSlot={<Target className="inline-icon" />} />
      <progress className="goal-progress" max={1} value={model.fraction} />
      <p className="goal-progress-text">{model.statusText}</p>
    </SurfaceCard>
  );
}

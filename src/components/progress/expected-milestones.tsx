import { CalendarDays, CheckCircle2 } from "lucide-react";

import { SurfaceCard } from "@/components/progress/surface-card";
import { SectionTitle } from "@/components/progress/section-title";
import type { MilestoneTableRow, ProgressOverviewItem } from "@/types/dashboard";

interface ExpectedMilestonesProps {
  rows: MilestoneTableRow[];
  progress: ProgressOverviewItem[];
}

export function ExpectedMilestones({ rows, progress }: ExpectedMilestonesProps) {
  return (
    <SurfaceCard className="two-column">
      <div>
        <SectionTitle title="Expected Milestone Dates" />
        <table className="data-table">
          <thead>
            <tr>
              <th>Milestone</th>
              <th>Overall avg</th>
              <th>7-day avg</th>
              <th>30-day avg</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((row) => (
              <tr key={row.milestone}>
                <td>
                  <CalendarDays className="inline-icon" /> {row.milestoneLabel}
                </td>
                {row.achieved ? (
                  <td colSpan={3}>
                    <CheckCircle2 className="inline-icon" /> Already achieved!
                  </td>
                ) : (
                  <>
                    <td>{row.overall}</td>
                    <td>{row.sevenDay}</td>
                    <td>{row.thirtyDay}</td>
                  </>
                )}
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      <div>
        <SectionTitle title="Progress Overview" />
        {progress.map((item) => (
          <div className="progress-item" key={item.milestone}>
            <p>{item.label}</p>
            <progress max={1} value={item.fraction} />
          </div>
        ))}
      </div>
    </SurfaceCard>
  );
}

import { SurfaceCard } from "@/components/progress/surface-card";
import { SectionTitle } from "@/components/progress/section-title";
import type { BestDayRow } from "@/types/dashboard";

export function BestDays({ rows }: { rows: BestDayRow[] }) {
  return (
    <SurfaceCard>
      <SectionTitle title="Best Days" />
      {rows.length === 0 ? (
        <p className="empty-copy">Not enough data to show top 5 days.</p>
      ) : (
        <table className="data-table">
          <thead>
            <tr>
              <th>Day</th>
              <th>Time Spent</th>
              <th>Time in Minutes</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((row) => (
              <tr key={row.day}>
                <td>{row.day}</td>
                <td>{row.timeSpent}</td>
                <td>{row.minutes}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </SurfaceCard>
  );
}

import type { Scorecard } from "@/types/dashboard";

interface MetricCardProps {
  scorecard: Scorecard;
}

function deltaClass(scorecard: Scorecard): string {
  if (scorecard.deltaTone === "off" || !scorecard.delta) {
    return "metric-card-delta";
  }
  return scorecard.delta.startsWith("-") ? "metric-card-delta metric-card-delta-down" : "metric-card-delta metric-card-delta-up";
}

export function MetricCard({ scorecard }: MetricCardProps) {
  return (
    <article className="metric-card">
      <p className="metric-card-title">{scorecard.label}</p>
      <p className="metric-card-value">{scorecard.value}</p>
      {scorecard.delta ? <p className={deltaClass(scorecard)}>{scorecard.delta}</p> : null}
    </article>
  );
}

export function ScorecardGrid({ scorecards, columns }: { scorecards: Scorecard[]; columns: number }) {
  return (
    <div className="metric-grid" style={{ gridTemplateColumns: `repeat(${columns}, minmax(0, 1fr))` }}>
      {scorecards.map((scorecard) => (
        <MetricCard key={scorecard.label} scorecard={scorecard} />
      ))}
    </div>
  );
}

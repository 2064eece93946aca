import type {
  DerivedDay,
  FutureCurvePoint,
  IsoDate,
  MilestoneForecastRow,
  MilestoneMarker,
  MilestoneProgress,
  MilestoneProjection,
  ProgressContext,
  ProgressForecast,
  RateBasis
} from "@/types/progress";
import { MAX_FORECAST_DAYS, MILESTONES, SECONDS_PER_HOUR, UPCOMING_MILESTONES_CAP } from "@/lib/domain/constants";
import { addDays } from "@/lib/utils/calendar";

export function daysToReach(currentHours: number, targetHours: number, rateSecondsPerDay: number): number {
  if (!(rateSecondsPerDay > 0)) {
    return Number.POSITIVE_INFINITY;
  }
  return ((targetHours - currentHours) * SECONDS_PER_HOUR) / rateSecondsPerDay;
}

export function projectMilestones(
  currentHours: number,
  lastDate: IsoDate,
  rateSecondsPerDay: number,
  milestones: readonly number[] = MILESTONES
): MilestoneProjection[] {
  return [...milestones]
    .sort((a, b) => a - b)
    .map((milestone): MilestoneProjection => {
      if (currentHours >= milestone) {
        return { milestone, status: "achieved" };
      }

      const days = daysToReach(currentHours, milestone, rateSecondsPerDay);
      // Same horizon as the projected curve.
      if (!Number.isFinite(days) || days > MAX_FORECAST_DAYS) {
        return { milestone, status: "unreachable", daysToReach: days };
      }

      return {
        milestone,
        status: "projected",
        daysToReach: days,
        predictedDate: addDays(lastDate, Math.floor(days))
      };
    });
}

/**
 * Daily steps from the day after `lastDate` until the first day at or above
 * `targetHours`. Empty when the rate cannot move the total; stops after
 * `maxDays` steps otherwise.
 */
export function generateFutureCurve(
  lastDate: IsoDate,
  lastCumulativeHours: number,
  rateSecondsPerDay: number,
  targetHours: number,
  maxDays: number = MAX_FORECAST_DAYS
): FutureCurvePoint[] {
  if (!(rateSecondsPerDay > 0)) {
    return [];
  }

  const hoursPerDay = rateSecondsPerDay / SECONDS_PER_HOUR;
  const points: FutureCurvePoint[] = [];

  for (let step = 1; step <= maxDays; step += 1) {
    const cumulativeHours = lastCumulativeHours + hoursPerDay * step;
    points.push({ date: addDays(lastDate, step), cumulativeHours });
    if (cumulativeHours >= targetHours) {
      break;
    }
  }

  return points;
}

export function selectUpcomingMilestones(
  currentHours: number,
  milestones: readonly number[] = MILESTONES,
  cap: number = UPCOMING_MILESTONES_CAP
): number[] {
  return [...milestones]
    .sort((a, b) => a - b)
    .filter((milestone) => milestone > currentHours)
    .slice(0, cap);
}

export function resolveTargetMilestone(currentHours: number, milestones: readonly number[] = MILESTONES): number | null {
  const ordered = [...milestones].sort((a, b) => a - b);
  const upcoming = selectUpcomingMilestones(currentHours, ordered);
  if (upcoming.length >= UPCOMING_MILESTONES_CAP) {
    return upcoming[UPCOMING_MILESTONES_CAP - 1];
  }
  return ordered.at(-1) ?? null;
}

export function resolveMilestoneMarkers(
  derived: DerivedDay[],
  projectedCurve: FutureCurvePoint[],
  milestones: readonly number[] = MILESTONES
): MilestoneMarker[] {
  const markers: MilestoneMarker[] = [];

  for (const milestone of [...milestones].sort((a, b) => a - b)) {
    const historical = derived.find((day) => day.cumulativeHours >= milestone);
    if (historical) {
      markers.push({ milestone, date: historical.date, source: "history" });
      continue;
    }

    const projected = projectedCurve.find((point) => point.cumulativeHours >= milestone);
    if (projected) {
      markers.push({ milestone, date: projected.date, source: "projection" });
    }
  }

  return markers;
}

export function computeMilestoneProgress(
  currentHours: number,
  milestones: readonly number[] = MILESTONES
): MilestoneProgress[] {
  return [...milestones]
    .sort((a, b) => a - b)
    .filter((milestone) => currentHours < milestone)
    .map((milestone) => ({
      milestone,
      percent: (currentHours / milestone) * 100
    }));
}

function emptyForecast(): ProgressForecast {
  return {
    rates: { overall: 0, sevenDay: 0, thirtyDay: 0 },
    targetMilestone: null,
    upcomingMilestones: [],
    curves: { overall: [], sevenDay: [], thirtyDay: [] },
    milestones: [],
    markers: [],
    progress: []
  };
}

export function buildForecast(
  context: Pick<ProgressContext, "derived" | "summary">,
  milestones: readonly number[] = MILESTONES
): ProgressForecast {
  const { summary, derived } = context;
  if (summary.lastDate === null) {
    return emptyForecast();
  }

  const lastDate = summary.lastDate;
  const currentHours = summary.currentHours;
  const rates: Record<RateBasis, number> = {
    overall: summary.averageSecondsPerDay,
    sevenDay: summary.current7DayAverage,
    thirtyDay: summary.current30DayAverage
  };

  const targetMilestone = resolveTargetMilestone(currentHours, milestones);
  const curveFor = (basis: RateBasis): FutureCurvePoint[] =>
    targetMilestone === null ? [] : generateFutureCurve(lastDate, currentHours, rates[basis], targetMilestone);

  const curves: Record<RateBasis, FutureCurvePoint[]> = {
    overall: curveFor("overall"),
    sevenDay: curveFor("sevenDay"),
    thirtyDay: curveFor("thirtyDay")
  };

  const projections: Record<RateBasis, MilestoneProjection[]> = {
    overall: projectMilestones(currentHours, lastDate, rates.overall, milestones),
    sevenDay: projectMilestones(currentHours, lastDate, rates.sevenDay, milestones),
    thirtyDay: projectMilestones(currentHours, lastDate, rates.thirtyDay, milestones)
  };

  const rows: MilestoneForecastRow[] = projections.overall.map((projection, index) => ({
    milestone: projection.milestone,
    achieved: projection.status === "achieved",
    byBasis: {
      overall: projection,
      sevenDay: projections.sevenDay[index],
      thirtyDay: projections.thirtyDay[index]
    }
  }));

  return {
    rates,
    targetMilestone,
    upcomingMilestones: selectUpcomingMilestones(currentHours, milestones),
    curves,
    milestones: rows,
    markers: resolveMilestoneMarkers(derived, curves.overall, milestones),
    progress: computeMilestoneProgress(currentHours, milestones)
  };
}

export const SECONDS_PER_HOUR = 3600;
export const SECONDS_PER_MINUTE = 60;

/** Cumulative-hours targets, ascending. */
export const MILESTONES = [50, 150, 300, 600, 1000, 1500] as const;

/** Maximum number of future milestones shown at any one point. */
export const UPCOMING_MILESTONES_CAP = 3;

export const ROLLING_WINDOWS = [7, 30] as const;

export const MONTHLY_BREAKDOWN_MONTHS = 12;

export const BEST_DAYS_COUNT = 5;

/** Hard stop for projected curves, roughly 20 years of daily steps. */
export const MAX_FORECAST_DAYS = 7305;

export const COLOUR_PALETTE = {
  primary: "#2E86C1",
  "7day_avg": "#FFA500",
  "30day_avg": "#2ECC71",
  "50": "#FF6B6B",
  "150": "#4ECDC4",
  "300": "#9B59B6",
  "600": "#F1C40F",
  "1000": "#E67E22",
  "1500": "#2ECC71"
} as const satisfies Record<string, string>;

type PaletteKey = keyof typeof COLOUR_PALETTE;

function isPaletteKey(key: string): key is PaletteKey {
  return Object.prototype.hasOwnProperty.call(COLOUR_PALETTE, key);
}

export function milestoneColour(milestone: number): string {
  const key = String(milestone);
  return isPaletteKey(key) ? COLOUR_PALETTE[key] : COLOUR_PALETTE.primary;
}

export type Tier = "unknown" | "normal" | "warning" | "critical";

export type TierColor = "gray" | "green" | "yellow" | "red";

export interface Thresholds {
  warning: number;
  critical: number;
}

export const GENERAL_TEMP_THRESHOLDS: Thresholds = {
  warning: 80,
  critical: 90,
};
export const JUNCTION_TEMP_THRESHOLDS: Thresholds = {
  warning: 95,
  critical: 105,
};
export const MEM_TEMP_THRESHOLDS: Thresholds = { warning: 85, critical: 95 };
export const POWER_THRESHOLDS: Thresholds = { warning: 220, critical: 300 };
export const RATIO_THRESHOLDS: Thresholds = { warning: 0.75, critical: 0.9 };

export function classify(
  value: number | undefined,
  thresholds: Thresholds
): Tier {
  if (value === undefined) return "unknown";
  if (value >= thresholds.critical) return "critical";
  if (value >= thresholds.warning) return "warning";
  return "normal";
}

export function classifyTemperature(celsius: number | undefined): Tier {
  return classify(celsius, GENERAL_TEMP_THRESHOLDS);
}

export function classifyJunctionTemp(celsius: number | undefined): Tier {
  return classify(celsius, JUNCTION_TEMP_THRESHOLDS);
}

export function classifyMemTemp(celsius: number | undefined): Tier {
  return classify(celsius, MEM_TEMP_THRESHOLDS);
}

export function classifyPower(watts: number | undefined): Tier {
  return classify(watts, POWER_THRESHOLDS);
}

/** Shared by both gauges. The ratio is already clamped to [0, 1]. */
export function classifyRatio(ratio: number | undefined): Tier {
  return classify(ratio, RATIO_THRESHOLDS);
}

const TIER_COLORS: Readonly<Record<Tier, TierColor>> = Object.freeze({
  critical: "red",
  warning: "yellow",
  normal: "green",
  unknown: "gray",
});

export function tierColor(tier: Tier): TierColor {
  return TIER_COLORS[tier];
}

export const PLACEHOLDER = "--";

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/**
 * Formats an optional reading. Absent values become the placeholder,
 * never "0". With `digits` the value is printed with fixed decimals.
 */
export function formatOptional(
  value: number | undefined,
  digits?: number
): string {
  if (value === undefined) return PLACEHOLDER;
  return digits === undefined ? String(value) : value.toFixed(digits);
}

export function formatVram(
  used: number | undefined,
  total: number | undefined
): string {
  if (used !== undefined && total !== undefined) {
    return `${used} / ${total} MB`;
  }
  if (used !== undefined) {
    return `${used} MB / ? MB`;
  }
  return PLACEHOLDER;
}

export function formatPercent(pct: number | undefined): string {
  if (pct === undefined) return PLACEHOLDER;
  return `${Math.round(clamp(pct, 0, 100))}%`;
}

// Gauge fill levels. Absent data fills to 0 while the label shows the
// placeholder.

export function vramRatio(
  used: number | undefined,
  total: number | undefined
): number {
  if (used === undefined || total === undefined || !(total > 0)) return 0;
  return clamp(used / total, 0, 1);
}

export function pctRatio(pct: number | undefined): number {
  if (pct === undefined) return 0;
  return clamp(pct, 0, 100) / 100;
}

import type { MetricSample } from "../monitoring/types.js";
import {
  formatOptional,
  formatPercent,
  formatVram,
  pctRatio,
  PLACEHOLDER,
  vramRatio,
} from "../presentation/format.js";
import {
  classifyJunctionTemp,
  classifyMemTemp,
  classifyPower,
  classifyRatio,
  classifyTemperature,
  tierColor,
} from "../presentation/severity.js";
import type { Tier, TierColor } from "../presentation/severity.js";
import type { Viewport } from "../types.js";

export const HEADER_ROWS = 3;
export const FOOTER_ROWS = 3;
export const GAUGE_ROWS = 3;
const BODY_BORDER_ROWS = 2;

export const TITLE = "GPU Monitor";
export const HINT = "Press 'q' or Esc to quit";

export interface FrameLine {
  text: string;
  // null for unstyled lines (device name, clocks, fan, separators)
  tier: Tier | null;
  color: TierColor | null;
}

export interface GaugeFrame {
  title: string;
  ratio: number;
  tier: Tier;
  color: TierColor;
  label: string;
}

export interface FrameLayout {
  header: number;
  body: number;
  text: number;
  gauge: number;
  footer: number;
}

export interface Frame {
  title: string;
  hint: string;
  lines: FrameLine[];
  utilization: GaugeFrame;
  vram: GaugeFrame;
  footer: string;
  layout: FrameLayout;
}

export interface FrameSource {
  readonly tick: number;
  readonly metrics: readonly MetricSample[];
  readonly source: string;
}

export function computeLayout(viewport: Viewport): FrameLayout {
  const rows = Math.max(0, Math.floor(viewport.rows));
  const body = Math.max(0, rows - HEADER_ROWS - FOOTER_ROWS);
  const inner = Math.max(0, body - BODY_BORDER_ROWS);
  return {
    header: HEADER_ROWS,
    body,
    text: Math.max(0, inner - 2 * GAUGE_ROWS),
    gauge: GAUGE_ROWS,
    footer: FOOTER_ROWS,
  };
}

function plain(text: string): FrameLine {
  return { text, tier: null, color: null };
}

function styled(text: string, tier: Tier): FrameLine {
  return { text, tier, color: tierColor(tier) };
}

export function deviceLines(sample: MetricSample, index: number): FrameLine[] {
  return [
    plain(`[${index}] ${sample.name}`),
    styled(
      `Temp: ${formatOptional(sample.temperatureC, 1)} °C`,
      classifyTemperature(sample.temperatureC)
    ),
    styled(
      `Junction: ${formatOptional(sample.junctionTempC, 1)} °C`,
      classifyJunctionTemp(sample.junctionTempC)
    ),
    styled(
      `Mem Temp: ${formatOptional(sample.memTempC, 1)} °C`,
      classifyMemTemp(sample.memTempC)
    ),
    styled(
      `Power: ${formatOptional(sample.powerW, 1)} W`,
      classifyPower(sample.powerW)
    ),
    plain(
      `Clocks: core ${formatOptional(sample.coreClockMhz)} MHz` +
        ` / mem ${formatOptional(sample.memClockMhz)} MHz`
    ),
    plain(`Fan: ${formatOptional(sample.fanRpm)} RPM`),
  ];
}

function gauge(title: string, ratio: number, label: string): GaugeFrame {
  const tier = classifyRatio(ratio);
  return { title, ratio, tier, color: tierColor(tier), label };
}

export function utilizationGauge(sample: MetricSample | undefined): GaugeFrame {
  return gauge(
    "GPU Utilization",
    pctRatio(sample?.utilizationPct),
    sample ? formatPercent(sample.utilizationPct) : PLACEHOLDER
  );
}

export function vramGauge(sample: MetricSample | undefined): GaugeFrame {
  return gauge(
    "VRAM",
    vramRatio(sample?.vramUsedMb, sample?.vramTotalMb),
    sample ? formatVram(sample.vramUsedMb, sample.vramTotalMb) : PLACEHOLDER
  );
}

function sampleAge(sample: MetricSample | undefined, now: Date): string {
  if (!sample) return PLACEHOLDER;
  return `${Math.max(0, now.getTime() - sample.timestamp.getTime())} ms`;
}

/**
 * Builds the frame for the current state. Never throws: absent readings and
 * an empty device list produce placeholders and empty gauges.
 */
export function buildFrame(
  state: FrameSource,
  viewport: Viewport,
  now: Date = new Date()
): Frame {
  const lines: FrameLine[] = [];
  state.metrics.forEach((sample, index) => {
    if (index > 0) lines.push(plain(""));
    lines.push(...deviceLines(sample, index));
  });

  const focus = state.metrics[0];
  return {
    title: TITLE,
    hint: HINT,
    lines,
    utilization: utilizationGauge(focus),
    vram: vramGauge(focus),
    footer:
      `Tick: ${state.tick} | ${state.source}` +
      ` | sample age: ${sampleAge(focus, now)}`,
    layout: computeLayout(viewport),
  };
}

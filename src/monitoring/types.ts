export interface MetricSample {
  name: string;
  // Temperatures in Celsius; undefined when the sensor is unavailable
  temperatureC?: number;
  junctionTempC?: number;
  memTempC?: number;
  utilizationPct?: number; // clamped to 0-100 only when displayed
  vramUsedMb?: number;
  vramTotalMb?: number;
  powerW?: number;
  fanRpm?: number;
  coreClockMhz?: number;
  memClockMhz?: number;
  timestamp: Date;
}

export type SamplerKind = "mock" | "snapshot";

export interface Sampler {
  readonly kind: SamplerKind;
  /** Footer annotation describing where the data comes from. */
  readonly description: string;
  sample(counter: number): MetricSample[];
}

export type Clock = () => Date;

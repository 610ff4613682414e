import type { Clock, MetricSample, Sampler } from "./types.js";

const VRAM_TOTAL_MB = 16384;

/**
 * Synthetic telemetry derived from the tick counter with modulo arithmetic,
 * so the same counter always yields the same readings (timestamps aside).
 * Device 1 has no junction/memory sensors and no fan.
 */
export class MockSampler implements Sampler {
  readonly kind = "mock" as const;
  readonly description = "simulated data";

  constructor(private readonly clock: Clock = () => new Date()) {}

  sample(counter: number): MetricSample[] {
    const timestamp = this.clock();
    const c = Math.max(0, Math.floor(counter));

    const primary: MetricSample = {
      name: "Simulated GPU 0",
      temperatureC: 45 + (c % 10),
      junctionTempC: 55 + ((c * 3) % 15),
      memTempC: 50 + ((c * 2) % 12),
      utilizationPct: (c * 7) % 100,
      vramUsedMb: 1200 + ((c * 37) % 800),
      vramTotalMb: VRAM_TOTAL_MB,
      powerW: 120 + ((c * 13) % 150),
      fanRpm: 1000 + ((c * 50) % 1500),
      coreClockMhz: 1500 + ((c * 25) % 600),
      memClockMhz: 2000,
      timestamp,
    };

    const secondary: MetricSample = {
      name: "Simulated GPU 1",
      temperatureC: 40 + ((c * 3) % 8),
      utilizationPct: (c * 3) % 100,
      vramUsedMb: 512 + ((c * 11) % 256),
      vramTotalMb: 8192,
      powerW: 60 + ((c * 5) % 40),
      coreClockMhz: 1200 + ((c * 10) % 300),
      timestamp,
    };

    return [primary, secondary];
  }
}

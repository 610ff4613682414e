import { readFileSync } from "fs";
import { z } from "zod";
import type { Logger } from "../services/logger.js";
import { SnapshotError, toError } from "../utils/errors.js";
import type { Clock, MetricSample, Sampler } from "./types.js";

// Readings with the wrong type are treated as an unavailable sensor
const reading = z.number().finite().optional().catch(undefined);
const counter = z.number().int().nonnegative().optional().catch(undefined);

export const DeviceReadingSchema = z.object({
  name: z.string().min(1),
  temperatureC: reading,
  junctionTempC: reading,
  memTempC: reading,
  utilizationPct: reading,
  vramUsedMb: counter,
  vramTotalMb: counter,
  powerW: reading,
  fanRpm: counter,
  coreClockMhz: counter,
  memClockMhz: counter,
});

export const SnapshotSchema = z.object({
  devices: z.array(DeviceReadingSchema),
});

export type DeviceReading = z.infer<typeof DeviceReadingSchema>;

const READING_FIELDS = [
  "temperatureC",
  "junctionTempC",
  "memTempC",
  "utilizationPct",
  "vramUsedMb",
  "vramTotalMb",
  "powerW",
  "fanRpm",
  "coreClockMhz",
  "memClockMhz",
] as const satisfies readonly (keyof DeviceReading)[];

const RawSnapshotSchema = z.object({
  devices: z.array(z.record(z.unknown())),
});

export interface DroppedReading {
  device: string;
  field: string;
}

export function parseSnapshot(data: unknown): DeviceReading[] {
  return SnapshotSchema.parse(data).devices;
}

/** Fields present in the document that parsing turned into absent readings. */
export function findDroppedReadings(
  data: unknown,
  devices: readonly DeviceReading[]
): DroppedReading[] {
  const raw = RawSnapshotSchema.safeParse(data);
  if (!raw.success) {
    return [];
  }
  return devices.flatMap((device, index) => {
    const fields = raw.data.devices[index] ?? {};
    return READING_FIELDS.filter(
      (field) => fields[field] !== undefined && device[field] === undefined
    ).map((field) => ({ device: device.name, field }));
  });
}

export interface SnapshotLoadOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * Replays device readings loaded once from a JSON file. Every call returns
 * the same readings stamped with the current time.
 */
export class SnapshotSampler implements Sampler {
  readonly kind = "snapshot" as const;
  readonly description: string;

  constructor(
    private readonly readings: readonly DeviceReading[],
    source: string,
    private readonly clock: Clock = () => new Date()
  ) {
    this.description = `snapshot: ${source}`;
  }

  static fromFile(
    file: string,
    options: SnapshotLoadOptions = {}
  ): SnapshotSampler {
    let data: unknown;
    let readings: DeviceReading[];
    try {
      data = JSON.parse(readFileSync(file, "utf8"));
      readings = parseSnapshot(data);
    } catch (error) {
      throw new SnapshotError(file, toError(error));
    }

    const log = options.logger?.child({ file });
    for (const dropped of findDroppedReadings(data, readings)) {
      log?.warn("Snapshot reading dropped", { ...dropped });
    }
    return new SnapshotSampler(readings, file, options.clock);
  }

  sample(_counter: number): MetricSample[] {
    const timestamp = this.clock();
    return this.readings.map((reading) => ({ ...reading, timestamp }));
  }
}

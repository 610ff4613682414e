import type { Logger } from "../services/logger.js";
import { ConfigError } from "../utils/errors.js";
import { MockSampler } from "./mock-sampler.js";
import { SnapshotSampler } from "./snapshot-sampler.js";
import type { Clock, Sampler, SamplerKind } from "./types.js";

export type SamplerOptions =
  | { kind: "mock"; clock?: Clock }
  | { kind: "snapshot"; file: string; clock?: Clock; logger?: Logger };

export const SAMPLER_KINDS: readonly SamplerKind[] = ["mock", "snapshot"];

export function createSampler(options: SamplerOptions): Sampler {
  switch (options.kind) {
    case "mock":
      return new MockSampler(options.clock);
    case "snapshot":
      if (!options.file) {
        throw new ConfigError("snapshot sampler requires a snapshot file");
      }
      return SnapshotSampler.fromFile(options.file, {
        clock: options.clock,
        logger: options.logger,
      });
  }
}

import { z } from "zod";
import { DEFAULT_POLL_TIMEOUT_MS } from "./app/event-loop.js";
import { SAMPLER_KINDS } from "./monitoring/sampler.js";
import type { SamplerKind } from "./monitoring/types.js";
import { ConfigError } from "./utils/errors.js";

export interface DashboardConfig {
  intervalMs: number;
  sampler: SamplerKind;
  snapshotFile?: string;
  logFile?: string;
  logLevel: string;
}

/** Raw string settings from the environment or the command line. */
export interface RawConfig {
  interval?: string;
  sampler?: string;
  snapshotFile?: string;
  logFile?: string;
  logLevel?: string;
}

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

/** Largest delay a Node.js timer accepts before clamping it to 1 ms. */
export const MAX_INTERVAL_MS = 2_147_483_647;

const ConfigSchema = z
  .object({
    intervalMs: z.coerce.number().int().positive().max(MAX_INTERVAL_MS),
    sampler: z.enum(["mock", "snapshot"]),
    snapshotFile: z.string().min(1).optional(),
    logFile: z.string().min(1).optional(),
    logLevel: z.enum(LOG_LEVELS),
  })
  .refine(
    (config) =>
      config.sampler !== "snapshot" || config.snapshotFile !== undefined,
    {
      message: "the snapshot sampler requires a snapshot file",
      path: ["snapshotFile"],
    }
  );

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function fromEnv(env: NodeJS.ProcessEnv): RawConfig {
  return {
    interval: nonEmpty(env.GPUWATCH_INTERVAL_MS),
    sampler: nonEmpty(env.GPUWATCH_SAMPLER),
    snapshotFile: nonEmpty(env.GPUWATCH_SNAPSHOT_FILE),
    logFile: nonEmpty(env.GPUWATCH_LOG_FILE),
    logLevel: nonEmpty(env.LOG_LEVEL),
  };
}

/**
 * Resolves settings from the environment with command-line overrides on top.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RawConfig = {}
): DashboardConfig {
  const base = fromEnv(env);
  const pick = (key: keyof RawConfig) =>
    nonEmpty(overrides[key]) ?? base[key];

  const result = ConfigSchema.safeParse({
    intervalMs: pick("interval") ?? String(DEFAULT_POLL_TIMEOUT_MS),
    sampler: pick("sampler") ?? "mock",
    snapshotFile: pick("snapshotFile"),
    logFile: pick("logFile"),
    logLevel: pick("logLevel") ?? "info",
  });

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
    );
    throw new ConfigError(issues.join("; "), {
      issues,
      samplers: SAMPLER_KINDS,
    });
  }
  return result.data;
}

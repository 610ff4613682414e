#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { loadConfig } from "./config.js";
import type { RawConfig } from "./config.js";
import { runDashboard } from "./dashboard.js";
import { SAMPLER_KINDS } from "./monitoring/sampler.js";
import { toError } from "./utils/errors.js";
import { handleError as handleErrorUtil } from "./utils/process.js";

const VERSION = "0.1.0";

// Error handler wrapper
function handleError<A extends unknown[]>(fn: (...args: A) => Promise<void>) {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      handleErrorUtil(toError(error));
    }
  };
}

function createProgram(): Command {
  const program = new Command();

  program
    .name("gpuwatch")
    .description("Live terminal dashboard for GPU telemetry")
    .version(VERSION)
    .option("-i, --interval <ms>", "refresh interval in milliseconds")
    .option(
      "-s, --sampler <kind>",
      `telemetry source (${SAMPLER_KINDS.join(", ")})`
    )
    .option(
      "-f, --snapshot-file <path>",
      "JSON device readings for the snapshot sampler" +
        " (see examples/partial-snapshot.json)"
    )
    .option("--log-file <path>", "write logs to this file")
    .option(
      "--log-level <level>",
      "log level (fatal, error, warn, info, debug, trace)"
    )
    .action(
      handleError(async (options: RawConfig) => {
        const config = loadConfig(process.env, options);
        const result = await runDashboard(config);
        console.log(
          chalk.gray(
            `gpuwatch stopped after ${result.ticks} ticks (${result.reason})`
          )
        );
        process.exit(0);
      })
    );

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => handleErrorUtil(toError(error)));

import { runEventLoop } from "./app/event-loop.js";
import type { LoopResult } from "./app/event-loop.js";
import { createDashboardState } from "./app/state.js";
import type { DashboardConfig } from "./config.js";
import { createSampler } from "./monitoring/sampler.js";
import type { SamplerOptions } from "./monitoring/sampler.js";
import { createLogger } from "./services/logger.js";
import type { Logger } from "./services/logger.js";
import { withTerminalSession } from "./terminal/session.js";
import type { TerminalStreams } from "./terminal/session.js";
import { setupSignalHandler } from "./utils/process.js";

export interface DashboardDeps {
  streams?: TerminalStreams;
  logger?: Logger;
}

export function samplerOptions(
  config: DashboardConfig,
  logger?: Logger
): SamplerOptions {
  if (config.sampler === "snapshot") {
    return { kind: "snapshot", file: config.snapshotFile ?? "", logger };
  }
  return { kind: "mock" };
}

/**
 * Runs the dashboard until the user quits. The sampler is created before the
 * terminal is touched, so configuration errors never leave it in raw mode.
 */
export async function runDashboard(
  config: DashboardConfig,
  deps: DashboardDeps = {}
): Promise<LoopResult> {
  const logger =
    deps.logger ??
    createLogger({ level: config.logLevel, file: config.logFile });
  const sampler = createSampler(samplerOptions(config, logger));
  const state = createDashboardState(sampler, logger);
  logger.dashboardStarted(sampler.description, config.intervalMs);

  return withTerminalSession(
    async (session) => {
      const signals = setupSignalHandler((signal) =>
        session.input.push({ type: "interrupt", reason: signal })
      );
      try {
        return await runEventLoop(state, session.input, session, {
          pollTimeoutMs: config.intervalMs,
          logger,
        });
      } finally {
        signals.cleanup();
      }
    },
    { streams: deps.streams, logger }
  );
}

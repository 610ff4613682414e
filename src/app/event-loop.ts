import type { Clock } from "../monitoring/types.js";
import { silentLogger } from "../services/logger.js";
import type { Logger } from "../services/logger.js";
import type { InputEvent, InputSource, Viewport } from "../types.js";
import { TerminalIoError, toError } from "../utils/errors.js";
import { buildFrame } from "./frame.js";
import type { Frame } from "./frame.js";
import type { DashboardState } from "./state.js";

export const DEFAULT_POLL_TIMEOUT_MS = 500;

export interface FrameRenderer {
  viewport(): Viewport;
  draw(frame: Frame): void;
}

export interface EventLoopOptions {
  pollTimeoutMs?: number;
  logger?: Logger;
  clock?: Clock;
}

export interface LoopResult {
  ticks: number;
  reason: string;
}

function dispatch(
  state: DashboardState,
  event: InputEvent | null
): string | null {
  if (event === null) {
    state.onTick();
    return null;
  }
  switch (event.type) {
    case "key":
      if (event.kind !== "press") return null;
      state.onKey(event.code);
      return state.running ? null : "quit key";
    case "interrupt":
      state.stop();
      return event.reason;
    case "resize":
      // next iteration redraws at the new size
      return null;
  }
}

/**
 * Draw, wait for input up to the poll timeout, then either handle the event
 * or tick. Draw and input failures propagate to the caller unretried.
 */
export async function runEventLoop(
  state: DashboardState,
  input: InputSource,
  renderer: FrameRenderer,
  options: EventLoopOptions = {}
): Promise<LoopResult> {
  const timeoutMs = options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? (() => new Date());
  let reason = "stopped";

  while (state.running) {
    try {
      renderer.draw(buildFrame(state, renderer.viewport(), clock()));
    } catch (error) {
      throw new TerminalIoError("draw", toError(error));
    }

    let event: InputEvent | null;
    try {
      event = await input.next(timeoutMs);
    } catch (error) {
      throw new TerminalIoError("input read", toError(error));
    }

    reason = dispatch(state, event) ?? reason;
  }

  logger.loopStopped(state.tick, reason);
  return { ticks: state.tick, reason };
}

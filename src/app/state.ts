import type { MetricSample, Sampler } from "../monitoring/types.js";
import { silentLogger } from "../services/logger.js";
import type { Logger } from "../services/logger.js";
import { describeKey } from "../types.js";
import type { KeyCode } from "../types.js";

export const QUIT_CHAR = "q";

export function isQuitKey(code: KeyCode): boolean {
  return (
    code.kind === "escape" || (code.kind === "char" && code.char === QUIT_CHAR)
  );
}

/**
 * Running/Stopped state machine owned by the event loop. `metrics` is
 * replaced on every tick, never mutated.
 */
export class DashboardState {
  private _running = true;
  private _tick = 0;
  private _metrics: readonly MetricSample[] = [];

  constructor(
    private readonly sampler: Sampler,
    private readonly logger: Logger = silentLogger
  ) {}

  get running(): boolean {
    return this._running;
  }

  get tick(): number {
    return this._tick;
  }

  get metrics(): readonly MetricSample[] {
    return this._metrics;
  }

  get source(): string {
    return this.sampler.description;
  }

  /** Samples with the current counter, then advances it. No-op once stopped. */
  onTick(): void {
    if (!this._running) return;
    this._metrics = Object.freeze(this.sampler.sample(this._tick));
    this.logger.tickSampled(this._tick, this._metrics.length);
    this._tick += 1;
  }

  onKey(code: KeyCode): void {
    if (!this._running) return;
    const quit = isQuitKey(code);
    this.logger.keyReceived(describeKey(code), quit);
    if (quit) {
      this._running = false;
    }
  }

  /** Stops without going through key handling (signals, Ctrl+C). */
  stop(): void {
    this._running = false;
  }
}

/** Initial state with the first tick already applied. */
export function createDashboardState(
  sampler: Sampler,
  logger?: Logger
): DashboardState {
  const state = new DashboardState(sampler, logger);
  state.onTick();
  return state;
}

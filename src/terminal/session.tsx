import React from "react";
import { render } from "ink";
import type { Instance } from "ink";
import type { Frame } from "../app/frame.js";
import type { FrameRenderer } from "../app/event-loop.js";
import DashboardApp from "../components/DashboardApp.js";
import { silentLogger } from "../services/logger.js";
import type { Logger } from "../services/logger.js";
import type { InputEvent, Viewport } from "../types.js";
import { TerminalSetupError, toError } from "../utils/errors.js";
import { InputQueue } from "./input-queue.js";

export const ENTER_ALT_SCREEN = "\x1b[?1049h";
export const LEAVE_ALT_SCREEN = "\x1b[?1049l";
export const HIDE_CURSOR = "\x1b[?25l";
export const SHOW_CURSOR = "\x1b[?25h";

const FALLBACK_VIEWPORT: Viewport = { columns: 80, rows: 24 };

export interface TerminalStreams {
  stdin: NodeJS.ReadStream;
  stdout: NodeJS.WriteStream;
}

export interface SessionOptions {
  streams?: TerminalStreams;
  logger?: Logger;
}

/**
 * Raw mode, alternate screen and the Ink instance for one dashboard run.
 * Acquire with `open`, release with `close`; `withTerminalSession` does both.
 */
export class TerminalSession implements FrameRenderer {
  readonly input = new InputQueue();
  private instance: Instance | null = null;
  private closed = false;
  private readonly onResize = () => {
    const { columns, rows } = this.viewport();
    this.input.push({ type: "resize", columns, rows });
  };

  private constructor(
    private readonly streams: TerminalStreams,
    private readonly logger: Logger
  ) {}

  static open(options: SessionOptions = {}): TerminalSession {
    const streams = options.streams ?? {
      stdin: process.stdin,
      stdout: process.stdout,
    };
    const logger = options.logger ?? silentLogger;

    if (!streams.stdin.isTTY || !streams.stdout.isTTY) {
      throw new TerminalSetupError(
        "stdin and stdout must be an interactive terminal"
      );
    }

    const session = new TerminalSession(streams, logger);
    try {
      streams.stdin.setRawMode(true);
      streams.stdout.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
      streams.stdout.on("resize", session.onResize);
    } catch (error) {
      session.close("setup failed");
      throw new TerminalSetupError("could not enable raw mode", toError(error));
    }

    const { columns, rows } = session.viewport();
    logger.sessionOpened(columns, rows);
    return session;
  }

  viewport(): Viewport {
    const { columns, rows } = this.streams.stdout;
    if (!columns || !rows) return FALLBACK_VIEWPORT;
    // One row short of the screen so Ink repaints in place instead of clearing
    return { columns, rows: Math.max(1, rows - 1) };
  }

  draw(frame: Frame): void {
    const element = (
      <DashboardApp
        frame={frame}
        viewport={this.viewport()}
        onInput={(event: InputEvent) => this.input.push(event)}
      />
    );

    if (this.instance) {
      this.instance.rerender(element);
      return;
    }

    this.instance = render(element, {
      stdin: this.streams.stdin,
      stdout: this.streams.stdout,
      exitOnCtrlC: false,
      patchConsole: false,
    });
  }

  /** Restores the terminal. Every step runs even if an earlier one fails. */
  close(reason: string): void {
    if (this.closed) return;
    this.closed = true;

    const steps: Array<[string, () => void]> = [
      ["unmount", () => this.instance?.unmount()],
      ["input", () => this.input.close()],
      [
        "resize listener",
        () => this.streams.stdout.off("resize", this.onResize),
      ],
      [
        "screen",
        () => this.streams.stdout.write(SHOW_CURSOR + LEAVE_ALT_SCREEN),
      ],
      ["raw mode", () => this.streams.stdin.setRawMode(false)],
    ];

    for (const [name, step] of steps) {
      try {
        step();
      } catch (error) {
        this.logger.error(`Terminal teardown step failed: ${name}`, error);
      }
    }

    this.instance = null;
    this.logger.sessionClosed(reason);
  }
}

export async function withTerminalSession<T>(
  fn: (session: TerminalSession) => Promise<T>,
  options: SessionOptions = {}
): Promise<T> {
  const session = TerminalSession.open(options);
  let reason = "error";
  try {
    const result = await fn(session);
    reason = "completed";
    return result;
  } finally {
    session.close(reason);
  }
}

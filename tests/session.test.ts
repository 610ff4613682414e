import { describe, test, expect, vi } from "vitest";
import { EventEmitter } from "events";
import type { DashboardConfig } from "../src/config.js";
import { runDashboard, samplerOptions } from "../src/dashboard.js";
import type { Logger } from "../src/services/logger.js";
import {
  ENTER_ALT_SCREEN,
  HIDE_CURSOR,
  LEAVE_ALT_SCREEN,
  SHOW_CURSOR,
  TerminalSession,
  withTerminalSession,
} from "../src/terminal/session.js";
import {
  ConfigError,
  SnapshotError,
  TerminalSetupError,
} from "../src/utils/errors.js";

interface FakeTerminalOptions {
  tty?: boolean;
  columns?: number;
  rows?: number;
  failRawMode?: boolean;
}

function fakeTerminal(options: FakeTerminalOptions = {}) {
  const written: string[] = [];
  const rawModes: boolean[] = [];
  const stdout = Object.assign(new EventEmitter(), {
    isTTY: options.tty ?? true,
    columns: options.columns ?? 100,
    rows: options.rows ?? 30,
    write: (chunk: string) => {
      written.push(chunk);
      return true;
    },
  });
  const stdin = Object.assign(new EventEmitter(), {
    isTTY: options.tty ?? true,
    setRawMode: (mode: boolean) => {
      if (options.failRawMode) throw new Error("EIO");
      rawModes.push(mode);
    },
  });
  return {
    streams: {
      stdin: stdin as unknown as NodeJS.ReadStream,
      stdout: stdout as unknown as NodeJS.WriteStream,
    },
    stdout,
    written,
    rawModes,
  };
}

describe("TerminalSession", () => {
  test("enables raw mode and switches to the alternate screen", () => {
    const terminal = fakeTerminal();
    const session = TerminalSession.open({ streams: terminal.streams });

    expect(terminal.rawModes).toEqual([true]);
    expect(terminal.written).toEqual([ENTER_ALT_SCREEN + HIDE_CURSOR]);
    session.close("test");
  });

  test("refuses to start without an interactive terminal", () => {
    const terminal = fakeTerminal({ tty: false });

    expect(() => TerminalSession.open({ streams: terminal.streams })).toThrow(
      TerminalSetupError
    );
    expect(terminal.rawModes).toEqual([]);
    expect(terminal.written).toEqual([]);
  });

  test("raw mode failure is a setup error and restores the screen", () => {
    const terminal = fakeTerminal({ failRawMode: true });
    const logger = {
      error: vi.fn(),
      sessionClosed: vi.fn(),
    } as unknown as Logger;

    expect(() =>
      TerminalSession.open({ streams: terminal.streams, logger })
    ).toThrow("Terminal setup failed: could not enable raw mode");
    expect(terminal.written).toEqual([SHOW_CURSOR + LEAVE_ALT_SCREEN]);
    expect(logger.error).toHaveBeenCalledWith(
      "Terminal teardown step failed: raw mode",
      expect.any(Error)
    );
  });

  test("leaves one spare row below the dashboard", () => {
    const terminal = fakeTerminal({ columns: 120, rows: 40 });
    const session = TerminalSession.open({ streams: terminal.streams });
    expect(session.viewport()).toEqual({ columns: 120, rows: 39 });
    session.close("test");
  });

  test("falls back to 80x24 when the size is unknown", () => {
    const terminal = fakeTerminal({ columns: 0, rows: 0 });
    const session = TerminalSession.open({ streams: terminal.streams });
    expect(session.viewport()).toEqual({ columns: 80, rows: 24 });
    session.close("test");
  });

  test("queues resize events", async () => {
    const terminal = fakeTerminal();
    const session = TerminalSession.open({ streams: terminal.streams });

    terminal.stdout.emit("resize");

    await expect(session.input.next(0)).resolves.toEqual({
      type: "resize",
      columns: 100,
      rows: 29,
    });
    session.close("test");
  });

  test("close restores the terminal exactly once", () => {
    const terminal = fakeTerminal();
    const session = TerminalSession.open({ streams: terminal.streams });

    session.close("first");
    session.close("second");

    expect(terminal.rawModes).toEqual([true, false]);
    expect(terminal.written).toEqual([
      ENTER_ALT_SCREEN + HIDE_CURSOR,
      SHOW_CURSOR + LEAVE_ALT_SCREEN,
    ]);
    expect(terminal.stdout.listenerCount("resize")).toBe(0);
  });
});

describe("withTerminalSession", () => {
  test("restores the terminal when the body fails", async () => {
    const terminal = fakeTerminal();
    const logger = {
      sessionOpened: vi.fn(),
      sessionClosed: vi.fn(),
    } as unknown as Logger;

    await expect(
      withTerminalSession(
        async () => {
          throw new Error("draw failed");
        },
        { streams: terminal.streams, logger }
      )
    ).rejects.toThrow("draw failed");

    expect(terminal.rawModes).toEqual([true, false]);
    expect(terminal.written.at(-1)).toBe(SHOW_CURSOR + LEAVE_ALT_SCREEN);
    expect(logger.sessionClosed).toHaveBeenCalledWith("error");
  });

  test("returns the body's result after restoring the terminal", async () => {
    const terminal = fakeTerminal();
    const result = await withTerminalSession(async () => 42, {
      streams: terminal.streams,
    });

    expect(result).toBe(42);
    expect(terminal.rawModes).toEqual([true, false]);
  });
});

describe("runDashboard", () => {
  const logger = {
    dashboardStarted: vi.fn(),
    tickSampled: vi.fn(),
  } as unknown as Logger;

  test("rejects a snapshot config without a file up front", async () => {
    const terminal = fakeTerminal();

    await expect(
      runDashboard(
        { intervalMs: 500, sampler: "snapshot", logLevel: "info" },
        { streams: terminal.streams, logger }
      )
    ).rejects.toBeInstanceOf(ConfigError);
    expect(terminal.rawModes).toEqual([]);
  });

  test("rejects an unreadable snapshot up front", async () => {
    const terminal = fakeTerminal();

    await expect(
      runDashboard(
        {
          intervalMs: 500,
          sampler: "snapshot",
          snapshotFile: "/nonexistent/readings.json",
          logLevel: "info",
        },
        { streams: terminal.streams, logger }
      )
    ).rejects.toBeInstanceOf(SnapshotError);
    expect(terminal.written).toEqual([]);
  });

  test("maps config to sampler options", () => {
    const mock: DashboardConfig = {
      intervalMs: 500,
      sampler: "mock",
      logLevel: "info",
    };
    const snapshot: DashboardConfig = {
      intervalMs: 500,
      sampler: "snapshot",
      snapshotFile: "a.json",
      logLevel: "info",
    };

    expect(samplerOptions(mock)).toEqual({ kind: "mock" });
    expect(samplerOptions(snapshot)).toEqual({
      kind: "snapshot",
      file: "a.json",
    });
    expect(samplerOptions(snapshot, logger)).toEqual({
      kind: "snapshot",
      file: "a.json",
      logger,
    });
  });
});

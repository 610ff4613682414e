import pino from "pino";

export interface LogContext {
  tick?: number;
  sampler?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(message: string, context?: Partial<LogContext>): void;
  warn(message: string, context?: Partial<LogContext>): void;
  error(message: string, error?: unknown, context?: Partial<LogContext>): void;
  debug(message: string, context?: Partial<LogContext>): void;
  child(additionalContext: Partial<LogContext>): Logger;

  // Dashboard lifecycle events
  dashboardStarted(sampler: string, intervalMs: number): void;
  tickSampled(tick: number, devices: number): void;
  keyReceived(key: string, stopped: boolean): void;
  sessionOpened(columns: number, rows: number): void;
  sessionClosed(reason: string): void;
  loopStopped(tick: number, reason: string): void;
}

export interface LoggerOptions {
  level?: string;
  /** File path for log output. stdout belongs to the dashboard, so without
   * a file the logger is silent. */
  file?: string;
  context?: LogContext;
}

function createPino(options: LoggerOptions): pino.Logger {
  const base: pino.LoggerOptions = {
    level: options.file ? options.level || "info" : "silent",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => {
        return { level: label };
      },
    },
  };
  if (!options.file) {
    return pino(base);
  }
  return pino(base, pino.destination({ dest: options.file, sync: true }));
}

export class PinoLogger implements Logger {
  private logger: pino.Logger;
  private context: LogContext;

  constructor(options: LoggerOptions = {}, instance?: pino.Logger) {
    this.logger = instance ?? createPino(options);
    this.context = options.context || {};
  }

  get level(): string {
    return this.logger.level;
  }

  private enrichContext(
    additionalContext: Partial<LogContext> = {}
  ): LogContext {
    return { ...this.context, ...additionalContext };
  }

  info(message: string, context: Partial<LogContext> = {}): void {
    this.logger.info(this.enrichContext(context), message);
  }

  warn(message: string, context: Partial<LogContext> = {}): void {
    this.logger.warn(this.enrichContext(context), message);
  }

  error(
    message: string,
    error?: unknown,
    context: Partial<LogContext> = {}
  ): void {
    if (error instanceof Error) {
      this.logger.error(
        this.enrichContext({
          ...context,
          error: {
            message: error.message,
            stack: error.stack,
            name: error.name,
          },
        }),
        message
      );
    } else if (error !== undefined) {
      this.logger.error(this.enrichContext({ ...context, error }), message);
    } else {
      this.logger.error(this.enrichContext(context), message);
    }
  }

  debug(message: string, context: Partial<LogContext> = {}): void {
    this.logger.debug(this.enrichContext(context), message);
  }

  child(additionalContext: Partial<LogContext>): Logger {
    return new PinoLogger(
      { context: this.enrichContext(additionalContext) },
      this.logger
    );
  }

  dashboardStarted(sampler: string, intervalMs: number): void {
    this.info("Dashboard started", {
      sampler,
      intervalMs,
      event: "dashboard_started",
    });
  }

  tickSampled(tick: number, devices: number): void {
    this.debug("Tick sampled", { tick, devices, event: "tick_sampled" });
  }

  keyReceived(key: string, stopped: boolean): void {
    this.debug("Key received", { key, stopped, event: "key_received" });
  }

  sessionOpened(columns: number, rows: number): void {
    this.info("Terminal session opened", {
      columns,
      rows,
      event: "session_opened",
    });
  }

  sessionClosed(reason: string): void {
    this.info("Terminal session closed", { reason, event: "session_closed" });
  }

  loopStopped(tick: number, reason: string): void {
    this.info("Event loop stopped", { tick, reason, event: "loop_stopped" });
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new PinoLogger(options);
}

// Logger that discards everything; default for library callers
export const silentLogger: Logger = new PinoLogger();

export class DashboardError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "DashboardError";
  }
}

export class ConfigError extends DashboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid configuration: ${message}`, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

export class SnapshotError extends DashboardError {
  constructor(file: string, cause?: Error) {
    super(`Failed to load snapshot: ${file}`, "SNAPSHOT_ERROR", {
      file,
      cause: cause?.message,
    });
    this.name = "SnapshotError";
  }
}

export class TerminalSetupError extends DashboardError {
  constructor(message: string, cause?: Error) {
    super(`Terminal setup failed: ${message}`, "TERMINAL_SETUP_ERROR", {
      cause: cause?.message,
    });
    this.name = "TerminalSetupError";
  }
}

export class TerminalIoError extends DashboardError {
  constructor(operation: string, cause?: Error) {
    super(`Terminal ${operation} failed`, "TERMINAL_IO_ERROR", {
      operation,
      cause: cause?.message,
    });
    this.name = "TerminalIoError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

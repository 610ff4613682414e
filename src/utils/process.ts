import chalk from "chalk";
import { DashboardError } from "./errors.js";

export function formatError(error: Error): string {
  const code =
    error instanceof DashboardError && error.code ? ` [${error.code}]` : "";
  const cause =
    error instanceof DashboardError ? error.details?.cause : undefined;
  const causeLine =
    typeof cause === "string"
      ? `\n  ${chalk.gray(`caused by: ${cause}`)}`
      : "";
  return (
    `${chalk.red("Error:")} ${error.message}` +
    `${chalk.gray(code)}${causeLine}`
  );
}

export function handleError(error: Error): void {
  console.error(formatError(error));
  process.exit(1);
}

export type SignalName = "SIGINT" | "SIGTERM";

export function setupSignalHandler(onSignal: (signal: SignalName) => void): {
  readonly received: SignalName | null;
  cleanup: () => void;
} {
  let received: SignalName | null = null;

  const handleSignal = (signal: SignalName) => {
    if (!received) {
      received = signal;
      onSignal(signal);
    }
  };

  const onInt = () => handleSignal("SIGINT");
  const onTerm = () => handleSignal("SIGTERM");
  process.on("SIGINT", onInt);
  process.on("SIGTERM", onTerm);

  return {
    get received() {
      return received;
    },
    cleanup: () => {
      process.off("SIGINT", onInt);
      process.off("SIGTERM", onTerm);
    },
  };
}

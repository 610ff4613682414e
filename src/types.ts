export type KeyCode =
  | { kind: "char"; char: string }
  | { kind: "escape" }
  | { kind: "enter" }
  | { kind: "tab" }
  | { kind: "backspace" }
  | { kind: "up" }
  | { kind: "down" }
  | { kind: "left" }
  | { kind: "right" }
  | { kind: "other" };

export type KeyEventKind = "press" | "repeat" | "release";

export type InputEvent =
  | { type: "key"; kind: KeyEventKind; code: KeyCode }
  | { type: "resize"; columns: number; rows: number }
  // Ctrl+C in raw mode or a termination signal
  | { type: "interrupt"; reason: string };

export interface InputSource {
  /** Resolves with the next event, or null once `timeoutMs` passes. */
  next(timeoutMs: number): Promise<InputEvent | null>;
}

export interface Viewport {
  columns: number;
  rows: number;
}

export function describeKey(code: KeyCode): string {
  return code.kind === "char" ? code.char : code.kind;
}

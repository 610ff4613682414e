import { useInput } from "ink";
import type { Key } from "ink";
import type { InputEvent, KeyCode } from "../types.js";

function toKeyCode(input: string, key: Key): KeyCode {
  if (key.escape) return { kind: "escape" };
  if (key.return) return { kind: "enter" };
  if (key.tab) return { kind: "tab" };
  if (key.backspace || key.delete) return { kind: "backspace" };
  if (key.upArrow) return { kind: "up" };
  if (key.downArrow) return { kind: "down" };
  if (key.leftArrow) return { kind: "left" };
  if (key.rightArrow) return { kind: "right" };
  if (input.length > 0 && !key.ctrl && !key.meta) {
    return { kind: "char", char: input };
  }
  return { kind: "other" };
}

/**
 * Ink reports key presses only. Ctrl+C arrives as input and becomes an
 * interrupt.
 */
export function fromInkInput(input: string, key: Key): InputEvent {
  if (key.ctrl && input === "c") {
    return { type: "interrupt", reason: "ctrl+c" };
  }
  return { type: "key", kind: "press", code: toKeyCode(input, key) };
}

interface KeyCaptureProps {
  onInput: (event: InputEvent) => void;
}

export default function KeyCapture({ onInput }: KeyCaptureProps) {
  useInput((input, key) => {
    onInput(fromInkInput(input, key));
  });

  return null;
}

import React from "react";
import type { Frame } from "../app/frame.js";
import type { InputEvent, Viewport } from "../types.js";
import DashboardView from "./DashboardView.js";
import KeyCapture from "./KeyCapture.js";

interface DashboardAppProps {
  frame: Frame;
  viewport: Viewport;
  onInput: (event: InputEvent) => void;
}

export default function DashboardApp({
  frame,
  viewport,
  onInput,
}: DashboardAppProps) {
  return (
    <>
      <KeyCapture onInput={onInput} />
      <DashboardView frame={frame} viewport={viewport} />
    </>
  );
}

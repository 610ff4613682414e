import React from "react";
import { Box, Text } from "ink";
import type { GaugeFrame } from "../app/frame.js";

export const FILLED_CHAR = "█";
export const EMPTY_CHAR = "░";

interface GaugeProps {
  gauge: GaugeFrame;
  width: number;
  height?: number;
}

// Borders and horizontal padding take 4 columns; title and label gaps take 2.
export function barWidth(gauge: GaugeFrame, width: number): number {
  return Math.max(0, width - 4 - gauge.title.length - gauge.label.length - 2);
}

export function renderBar(ratio: number, width: number): string {
  const filled = Math.min(width, Math.max(0, Math.round(ratio * width)));
  return FILLED_CHAR.repeat(filled) + EMPTY_CHAR.repeat(width - filled);
}

export default function Gauge({ gauge, width, height = 3 }: GaugeProps) {
  const bar = renderBar(gauge.ratio, barWidth(gauge, width));

  return (
    <Box
      height={height}
      width={width}
      borderStyle="round"
      borderColor={gauge.color}
      paddingX={1}
    >
      <Text>
        <Text bold>{gauge.title}</Text>
        <Text> </Text>
        <Text color={gauge.color}>{bar}</Text>
        <Text> </Text>
        <Text color={gauge.color}>{gauge.label}</Text>
      </Text>
    </Box>
  );
}

import React from "react";
import { Box, Text } from "ink";
import type { Frame, FrameLine } from "../app/frame.js";
import type { Viewport } from "../types.js";
import Gauge from "./Gauge.js";

interface DashboardViewProps {
  frame: Frame;
  viewport: Viewport;
}

function Line({ line }: { line: FrameLine }) {
  // Ink drops empty Text nodes, so separators need a space to keep their row
  const text = line.text || " ";
  return line.color ? (
    <Text color={line.color}>{text}</Text>
  ) : (
    <Text>{text}</Text>
  );
}

export default function DashboardView({
  frame,
  viewport,
}: DashboardViewProps) {
  const { layout } = frame;
  const innerWidth = Math.max(0, viewport.columns - 2);

  return (
    <Box flexDirection="column" width={viewport.columns}>
      {/* Header */}
      <Box
        height={layout.header}
        borderStyle="round"
        borderColor="cyan"
        paddingX={1}
      >
        <Text>
          <Text bold color="cyan">
            {frame.title}
          </Text>
          <Text color="gray"> | {frame.hint}</Text>
        </Text>
      </Box>

      {/* Body: device text, then the two gauges for device 0 */}
      <Box
        height={layout.body}
        flexDirection="column"
        overflow="hidden"
        borderStyle="single"
        borderColor="gray"
      >
        <Box
          height={layout.text}
          flexDirection="column"
          overflow="hidden"
          paddingX={1}
        >
          {frame.lines.map((line, index) => (
            <Line key={index} line={line} />
          ))}
        </Box>
        <Gauge
          gauge={frame.utilization}
          width={innerWidth}
          height={layout.gauge}
        />
        <Gauge gauge={frame.vram} width={innerWidth} height={layout.gauge} />
      </Box>

      {/* Footer */}
      <Box
        height={layout.footer}
        borderStyle="round"
        borderColor="gray"
        paddingX={1}
      >
        <Text color="gray">{frame.footer}</Text>
      </Box>
    </Box>
  );
}

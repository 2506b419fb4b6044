import { Box, Text } from "ink"
import React from "react"

import { rowLayout, rowParts, type ChartLine } from "@tui/chart"

interface ChartViewProps {
  /** Every content line; the view shows `height` of them from `offset`. */
  lines: ChartLine[]
  offset: number
  height: number
  columns: number
}

/** The scrollable chart body. */
export function ChartView({ lines, offset, height, columns }: ChartViewProps) {
  const layout = rowLayout(lines, columns)
  const visible = lines.slice(offset, offset + height)

  return (
    <Box flexDirection="column" height={height}>
      {visible.map((line, i) => {
        const key = offset + i
        switch (line.kind) {
          case "blank":
            return <Text key={key}> </Text>
          case "title":
            return (
              <Text key={key} bold color={line.color} wrap="truncate">
                {line.text}
              </Text>
            )
          case "bar": {
            const parts = rowParts(line, layout)
            const color = line.value < 0 ? "red" : line.color
            return (
              <Text key={key} wrap="truncate">
                {parts.label} <Text color={color}>{parts.bar}</Text>{" "}
                {parts.value}
              </Text>
            )
          }
        }
      })}
    </Box>
  )
}

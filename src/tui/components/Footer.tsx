import { Box, Text } from "ink"
import React from "react"

import { METRIC_LABELS, type BucketValue, type Metric } from "@/types"
import { formatNumber } from "@tui/chart"
import type { ViewMode } from "@tui/mvu/model"

export const KEY_HINTS = "q quit · m toggle view · ←/→ metric · ↑/↓ scroll"

/** Props for the Footer component. */
interface FooterProps {
  mode: ViewMode
  metric: Metric
  total: BucketValue
  /** Number of repositories whose collection failed. */
  skipped: number
  /** 1-based first and last visible line, and the content height. */
  position: { first: number; last: number; height: number }
  columns: number
}

export function modeText(mode: ViewMode, metric: Metric): string {
  return mode === "split" ? "Split" : `Single: ${METRIC_LABELS[metric]}`
}

export function totalsText(total: BucketValue, skipped: number): string {
  const parts = [
    `${formatNumber(total.commits)} commits`,
    `+${formatNumber(total.additions)}`,
    `-${formatNumber(total.deletions)}`,
    `net ${formatNumber(total.netLines)}`,
    `${formatNumber(total.filesChanged)} files`,
  ]
  if (skipped > 0) {
    const noun = skipped === 1 ? "repository" : "repositories"
    parts.push(`${skipped} ${noun} skipped`)
  }
  return parts.join("  ")
}

/** Key hints, view mode, scroll position and totals below the chart. */
export function Footer({
  mode,
  metric,
  total,
  skipped,
  position,
  columns,
}: FooterProps) {
  return (
    <Box flexDirection="column" height={4}>
      <Text dimColor>{"─".repeat(columns)}</Text>
      <Text wrap="truncate">
        <Text bold>{modeText(mode, metric)}</Text>
        <Text dimColor>
          {"  "}lines {position.first}-{position.last} of {position.height}
        </Text>
      </Text>
      <Text wrap="truncate" color={skipped > 0 ? "yellow" : undefined}>
        {totalsText(total, skipped)}
      </Text>
      <Text dimColor wrap="truncate">
        {KEY_HINTS}
      </Text>
    </Box>
  )
}

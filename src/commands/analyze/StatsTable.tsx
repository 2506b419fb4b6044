import { Box, Text } from "ink"
import React from "react"

import type { AggregatedSnapshot, BucketValue } from "@/types"
import { formatNumber } from "@tui/chart"
import { headerText } from "@tui/components/Header"

export const TABLE_HEADER = [
  "Period",
  "Commits",
  "Added",
  "Deleted",
  "Net",
  "Files",
] as const

type Row = readonly string[]

function signed(n: number, sign: "+" | "-"): string {
  return n === 0 ? "0" : `${sign}${formatNumber(n)}`
}

function net(n: number): string {
  return n > 0 ? `+${formatNumber(n)}` : formatNumber(n)
}

export function tableRow(label: string, value: BucketValue): Row {
  return [
    label,
    formatNumber(value.commits),
    signed(value.additions, "+"),
    signed(value.deletions, "-"),
    net(value.netLines),
    formatNumber(value.filesChanged),
  ]
}

export function columnWidths(rows: readonly Row[]): number[] {
  return TABLE_HEADER.map((_, col) =>
    Math.max(...rows.map((row) => (row[col] ?? "").length)),
  )
}

/** Left-aligns the label column and right-aligns the numbers. */
export function formatRow(row: Row, widths: readonly number[]): string {
  return row
    .map((cell, col) => {
      const width = widths[col] ?? cell.length
      return col === 0 ? cell.padEnd(width) : cell.padStart(width)
    })
    .join("  ")
}

interface StatsTableProps {
  snapshot: AggregatedSnapshot
}

/** Static per-bucket report followed by a totals row. */
export function StatsTable({ snapshot }: StatsTableProps) {
  const rows = snapshot.series.map((entry) => ({
    key: entry.key.start,
    cells: tableRow(entry.key.label, entry.value),
  }))
  const total = tableRow("Total", snapshot.total)
  const widths = columnWidths([
    TABLE_HEADER,
    ...rows.map((r) => r.cells),
    total,
  ])
  const rule = "─".repeat(
    widths.reduce((sum, w) => sum + w, 0) + 2 * (widths.length - 1),
  )

  return (
    <Box flexDirection="column">
      <Text color="cyan">{headerText(snapshot)}</Text>
      <Text> </Text>
      <Text bold>{formatRow(TABLE_HEADER, widths)}</Text>
      {rows.map((row) => (
        <Text key={row.key}>{formatRow(row.cells, widths)}</Text>
      ))}
      <Text color="gray">{rule}</Text>
      <Text bold>{formatRow(total, widths)}</Text>
    </Box>
  )
}

import { Box, Text } from "ink"
import React from "react"

import type { AggregatedSnapshot } from "@/types"

/** `<repos> | <period> | <from> → <to> | <tz>` */
export function headerText(snapshot: AggregatedSnapshot): string {
  return [
    snapshot.repositories.join(", "),
    snapshot.period,
    `${snapshot.window.since} → ${snapshot.window.until}`,
    snapshot.timeZone,
  ].join(" | ")
}

interface HeaderProps {
  snapshot: AggregatedSnapshot
  columns: number
}

export function Header({ snapshot, columns }: HeaderProps) {
  return (
    <Box flexDirection="column" height={3}>
      <Text bold color="cyan">
        churnscope
      </Text>
      <Text wrap="truncate">{headerText(snapshot)}</Text>
      <Text dimColor>{"─".repeat(columns)}</Text>
    </Box>
  )
}

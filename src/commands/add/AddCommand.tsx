import { Box, Text } from "ink"
import React from "react"

import type { RepositoryEntry } from "@/config"

interface AddCommandProps {
  entry: RepositoryEntry
  /** False when the path was already registered and nothing changed. */
  added: boolean
  configFile: string
}

export function AddCommand({ entry, added, configFile }: AddCommandProps) {
  if (!added) {
    return (
      <Text color="yellow">
        Already registered: {entry.name} ({entry.path})
      </Text>
    )
  }

  return (
    <Box flexDirection="column">
      <Text>
        <Text bold color="green">
          Added
        </Text>{" "}
        {entry.name} ({entry.path})
      </Text>
      <Text> Branch: {entry.branch ?? "HEAD"}</Text>
      <Text color="gray"> Saved to {configFile}</Text>
    </Box>
  )
}

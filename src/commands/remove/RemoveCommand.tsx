import { Text } from "ink"
import React from "react"

import type { RepositoryEntry } from "@/config"

export function RemoveCommand({ entry }: { entry: RepositoryEntry }) {
  return (
    <Text>
      <Text bold color="green">
        Removed
      </Text>{" "}
      {entry.name} ({entry.path})
    </Text>
  )
}

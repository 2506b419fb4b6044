import { Box, Text } from "ink"
import Spinner from "ink-spinner"
import React from "react"

import { AppError } from "@/errors"
import type { AggregationProgress } from "@/types"

/**
 * Maps collection progress to a status line.
 * @returns e.g. `Collecting commits (2/5)...`
 */
export function progressLabel(progress: AggregationProgress): string {
  if (progress.total === 0) return "Collecting commits..."
  return `Collecting commits (${progress.completed}/${progress.total})...`
}

export function LoadingView({ progress }: { progress: AggregationProgress }) {
  return (
    <Box flexDirection="column">
      <Box>
        <Text color="cyan">
          <Spinner type="dots" />
        </Text>
        <Text> {progressLabel(progress)}</Text>
      </Box>
      {progress.current ? (
        <Text dimColor>Finished {progress.current}</Text>
      ) : null}
    </Box>
  )
}

export function FailedView({ error }: { error: Error }) {
  return (
    <Box flexDirection="column">
      <Text color="red">Error: {error.message}</Text>
      {error instanceof AppError && error.hint ? (
        <Text>Hint: {error.hint}</Text>
      ) : null}
    </Box>
  )
}

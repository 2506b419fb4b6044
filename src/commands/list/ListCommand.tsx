import { Box, Text } from "ink"
import React from "react"

import type { RepositoryStatus } from "@commands/utils/repositories"

const HEADINGS = ["Name", "Path", "Branch"] as const

function cells(repo: RepositoryStatus): string[] {
  return [repo.name, repo.path, repo.branch ?? "HEAD"]
}

interface ListCommandProps {
  repositories: RepositoryStatus[]
}

/**
 * Registered repositories, one per row. The status column marks whether the
 * path is currently a git repository.
 */
export function ListCommand({ repositories }: ListCommandProps) {
  if (repositories.length === 0) {
    return <Text color="gray">No repositories registered.</Text>
  }

  const widths = HEADINGS.map((heading, col) =>
    Math.max(
      heading.length,
      ...repositories.map((repo) => (cells(repo)[col] ?? "").length),
    ),
  )
  const pad = (values: readonly string[]) =>
    values.map((value, col) => value.padEnd(widths[col] ?? 0)).join("  ")

  return (
    <Box flexDirection="column">
      <Text bold>{pad(HEADINGS)}  Status</Text>
      {repositories.map((repo) => (
        <Text key={repo.name}>
          {pad(cells(repo))}{"  "}
          {repo.valid ? (
            <Text color="green">✓</Text>
          ) : (
            <Text color="red">✗</Text>
          )}
        </Text>
      ))}
    </Box>
  )
}

import type {
  AggregatedSnapshot,
  BucketValue,
  OutputFormat,
  RepositoryFailure,
} from "@/types"

/**
 * Resolves CLI flags to a typed output format.
 * --json shorthand wins over --output.
 */
export function resolveFormat(opts: {
  output?: OutputFormat
  json?: boolean
}): OutputFormat {
  if (opts.json) return "json"
  return opts.output ?? "table"
}

/**
 * When format is "json", writes JSON to stdout and returns true.
 * Otherwise returns false and the caller renders with Ink.
 */
export function formatOutput(format: OutputFormat, data: unknown): boolean {
  if (format === "json") {
    console.log(JSON.stringify(data, null, 2))
    return true
  }
  return false
}

interface JsonBucket {
  commits: number
  additions: number
  deletions: number
  net_lines: number
  files_changed: number
}

function toJsonBucket(value: BucketValue): JsonBucket {
  return {
    commits: value.commits,
    additions: value.additions,
    deletions: value.deletions,
    net_lines: value.netLines,
    files_changed: value.filesChanged,
  }
}

/** The machine-readable report written by `--output json`. */
export interface JsonReport {
  repository: string
  period: string
  timezone: string
  from: string
  to: string
  stats: ({ label: string; date: string } & JsonBucket)[]
  total: JsonBucket
  repositories: string[]
  failures: { name: string; path: string; code: string; error: string }[]
}

export function toJsonReport(
  snapshot: AggregatedSnapshot,
  failures: readonly RepositoryFailure[],
): JsonReport {
  return {
    repository: snapshot.repositories.join(", "),
    period: snapshot.period,
    timezone: snapshot.timeZone,
    from: snapshot.window.since,
    to: snapshot.window.until,
    stats: snapshot.series.map((entry) => ({
      label: entry.key.label,
      date: entry.key.start,
      ...toJsonBucket(entry.value),
    })),
    total: toJsonBucket(snapshot.total),
    repositories: snapshot.repositories,
    failures: failures.map((f) => ({
      name: f.name,
      path: f.path,
      code: f.error.code,
      error: f.error.message,
    })),
  }
}

export const CSV_HEADER =
  "label,date,commits,additions,deletions,net_lines,files_changed"

function csvField(value: string | number): string {
  const text = String(value)
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

/** One header line plus one line per bucket, newline-terminated. */
export function formatCsv(snapshot: AggregatedSnapshot): string {
  const rows = snapshot.series.map((entry) =>
    [
      entry.key.label,
      entry.key.start,
      entry.value.commits,
      entry.value.additions,
      entry.value.deletions,
      entry.value.netLines,
      entry.value.filesChanged,
    ]
      .map(csvField)
      .join(","),
  )
  return [CSV_HEADER, ...rows].join("\n") + "\n"
}

/** One stderr line per repository that was skipped. */
export function failureWarnings(
  failures: readonly RepositoryFailure[],
): string[] {
  return failures.map(
    (f) => `Warning: skipped ${f.name} (${f.path}): ${f.error.message}`,
  )
}

import type { CollectionError } from "@/errors"

/** Output format for the analysis command. */
export type OutputFormat = "table" | "json" | "csv" | "tui"

/** All supported output formats, in help-text order. */
export const OUTPUT_FORMATS = ["table", "json", "csv", "tui"] as const

/** Calendar granularities commits can be bucketed into. */
export const PERIODS = ["daily", "weekly", "monthly", "yearly"] as const

/** A calendar bucket granularity. */
export type Period = (typeof PERIODS)[number]

/** The five tracked metrics, in the order the chart UI cycles through them. */
export const METRICS = [
  "commits",
  "additions",
  "deletions",
  "netLines",
  "filesChanged",
] as const

/** One of the tracked per-bucket metrics. */
export type Metric = (typeof METRICS)[number]

/** Display names for each metric. */
export const METRIC_LABELS: { [key in Metric]: string } = {
  commits: "Commits",
  additions: "Additions",
  deletions: "Deletions",
  netLines: "Net Lines",
  filesChanged: "Files Changed",
}

/** Colors associated with each metric. */
export const METRIC_COLORS: { [key in Metric]: string } = {
  commits: "cyan",
  additions: "green",
  deletions: "red",
  netLines: "yellow",
  filesChanged: "blue",
}

/** Weekday labels, Monday first (ISO order). */
export const WEEKDAY_LABELS = [
  "Mon",
  "Tue",
  "Wed",
  "Thu",
  "Fri",
  "Sat",
  "Sun",
] as const

/** A single file changed within a commit. */
export interface FileChange {
  /** Repository-relative file path (new path for renames). */
  path: string
  /** Lines added; 0 for binary files. */
  additions: number
  /** Lines deleted; 0 for binary files. */
  deletions: number
}

/** A commit as read from the repository, before filtering. */
export interface RawCommit {
  /** Full SHA-1 commit hash. */
  hash: string
  /** Author timestamp. */
  authoredAt: Date
  /** Parent hashes; more than one means a merge commit. */
  parents: string[]
  /** Per-file line counts (against the first parent for merges). */
  files: FileChange[]
}

/** One commit's contribution to a bucket after extension filtering. */
export interface CommitStat {
  authoredAt: Date
  additions: number
  deletions: number
  filesChanged: number
  /** Always 1; a commit that is filtered out never becomes a CommitStat. */
  commits: 1
  isMerge: boolean
}

/** Accumulated metrics for one period. */
export interface BucketValue {
  commits: number
  additions: number
  deletions: number
  /** additions - deletions; may be negative. */
  netLines: number
  filesChanged: number
}

/**
 * Identifies one aggregation bucket in the resolved timezone.
 * `start` is the first calendar day of the period (YYYY-MM-DD) and orders keys.
 */
export interface PeriodKey {
  start: string
  label: string
}

/** One bucket of a series. */
export interface SeriesEntry {
  key: PeriodKey
  value: BucketValue
}

/** Gap-filled buckets ordered ascending by `key.start`. */
export type Series = SeriesEntry[]

/** Commit counts by ISO weekday (index 0 = Monday) and by hour of day. */
export interface ActivityStats {
  weekday: number[]
  hourly: number[]
}

/** Inclusive window of YYYY-MM-DD calendar dates in the resolved timezone. */
export interface DateWindow {
  since: string
  until: string
}

/** A repository to analyze. */
export interface RepositorySpec {
  name: string
  /** Absolute filesystem path. */
  path: string
  /** Branch to walk; HEAD when absent. */
  branch?: string
}

/** Commit filters applied to every repository. */
export interface CollectionFilters {
  /** Overrides each repository's own branch when set. */
  branch?: string
  /** Lowercase extensions without a leading dot; empty matches every file. */
  extensions: string[]
  includeMerges: boolean
}

/** Per-repository outcome of collection. */
export type RepositoryResult =
  | {
      status: "ok"
      name: string
      path: string
      series: Series
      activity: ActivityStats
    }
  | {
      status: "failed"
      name: string
      path: string
      error: CollectionError
    }

/** A repository whose collection failed. */
export type RepositoryFailure = Extract<RepositoryResult, { status: "failed" }>

/** Merged result across every successful repository. */
export interface AggregatedSnapshot {
  /** Names of repositories that contributed, in input order. */
  repositories: string[]
  period: Period
  /** Label of the resolved timezone (local, UTC, or the IANA name). */
  timeZone: string
  window: DateWindow
  series: Series
  total: BucketValue
  activity: ActivityStats
}

/** Snapshot plus the per-repository failures it was built around. */
export interface AggregationOutcome {
  snapshot: AggregatedSnapshot
  failures: RepositoryFailure[]
}

/** Collection progress, reported as each repository finishes. */
export interface AggregationProgress {
  completed: number
  total: number
  /** Name of the repository that just finished. */
  current?: string
}

/** Read access to one repository's history. */
export interface RepositoryReader {
  /** Whether the path exists and is a git repository (work tree or bare). */
  isRepository(): Promise<boolean>
  /** Whether HEAD points at a commit (false for a freshly initialized repo). */
  hasCommits(): Promise<boolean>
  /** Whether the given branch or ref resolves to a commit. */
  refExists(ref: string): Promise<boolean>
  /**
   * Lists commits reachable from `ref` committed at or after `since`,
   * newest first, with per-file line counts.
   */
  listCommits(ref: string, since: Date): Promise<RawCommit[]>
}

/** Opens a reader for a repository path. */
export type ReaderFactory = (path: string) => RepositoryReader

import type {
  AggregatedSnapshot,
  BucketValue,
  RepositoryFailure,
} from "@/types"
import { NotARepositoryError } from "@/errors"
import { emptyActivity, emptyBucket, totalOf } from "@stats/bucket"
import { shiftDay } from "@stats/period"

/**
 * Daily snapshot starting 2024-03-01 with one bucket per entry.
 * `netLines` is derived from additions and deletions.
 */
export function snapshotOf(
  values: Partial<Omit<BucketValue, "netLines">>[],
  overrides: Partial<AggregatedSnapshot> = {},
): AggregatedSnapshot {
  const series = values.map((partial, i) => {
    const day = shiftDay("2024-03-01", i)
    const value = { ...emptyBucket(), ...partial }
    value.netLines = value.additions - value.deletions
    return { key: { start: day, label: day }, value }
  })
  const last = series[series.length - 1]?.key.start ?? "2024-03-01"
  return {
    repositories: ["app"],
    period: "daily",
    timeZone: "UTC",
    window: { since: "2024-03-01", until: last },
    series,
    total: totalOf(series),
    activity: emptyActivity(),
    ...overrides,
  }
}

/** A week of quiet days with commits on the 2nd and 4th. */
export function weekSnapshot(): AggregatedSnapshot {
  return snapshotOf([
    {},
    { commits: 2, additions: 30, deletions: 10, filesChanged: 3 },
    {},
    { commits: 1, additions: 5, deletions: 20, filesChanged: 1 },
    {},
    {},
    {},
  ])
}

export function failureOf(name: string, path: string): RepositoryFailure {
  return {
    status: "failed",
    name,
    path,
    error: new NotARepositoryError(name, path),
  }
}

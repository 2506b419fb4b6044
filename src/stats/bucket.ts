import type { ActivityStats, BucketValue, CommitStat, Series } from "@/types"

export function emptyBucket(): BucketValue {
  return {
    commits: 0,
    additions: 0,
    deletions: 0,
    netLines: 0,
    filesChanged: 0,
  }
}

/** Folds one commit into a bucket, returning the new bucket. */
export function foldCommit(bucket: BucketValue, stat: CommitStat): BucketValue {
  return {
    commits: bucket.commits + stat.commits,
    additions: bucket.additions + stat.additions,
    deletions: bucket.deletions + stat.deletions,
    netLines: bucket.netLines + stat.additions - stat.deletions,
    filesChanged: bucket.filesChanged + stat.filesChanged,
  }
}

/** Field-wise sum; commutative and associative. */
export function mergeBuckets(a: BucketValue, b: BucketValue): BucketValue {
  return {
    commits: a.commits + b.commits,
    additions: a.additions + b.additions,
    deletions: a.deletions + b.deletions,
    netLines: a.netLines + b.netLines,
    filesChanged: a.filesChanged + b.filesChanged,
  }
}

/** Sum of every bucket in a series. */
export function totalOf(series: Series): BucketValue {
  return series.reduce(
    (sum, entry) => mergeBuckets(sum, entry.value),
    emptyBucket(),
  )
}

export function emptyActivity(): ActivityStats {
  return {
    weekday: new Array<number>(7).fill(0),
    hourly: new Array<number>(24).fill(0),
  }
}

export function mergeActivity(
  a: ActivityStats,
  b: ActivityStats,
): ActivityStats {
  return {
    weekday: a.weekday.map((n, i) => n + (b.weekday[i] ?? 0)),
    hourly: a.hourly.map((n, i) => n + (b.hourly[i] ?? 0)),
  }
}

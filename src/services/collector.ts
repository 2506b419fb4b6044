import {
  BranchNotFoundError,
  CollectionError,
  NotARepositoryError,
  ReadFailureError,
} from "@/errors"
import { filterFiles } from "@/file-filter"
import type {
  ActivityStats,
  BucketValue,
  CollectionFilters,
  CommitStat,
  DateWindow,
  Period,
  PeriodKey,
  RawCommit,
  ReaderFactory,
  RepositoryResult,
  RepositorySpec,
  Series,
} from "@/types"
import { emptyActivity, emptyBucket, foldCommit } from "@stats/bucket"
import { dayToDate, periodKeyFor, shiftDay } from "@stats/period"
import type { TimeZoneResolver } from "@stats/timezone"

/** Everything a collection run needs besides the repository itself. */
export interface CollectionRequest {
  window: DateWindow
  period: Period
  resolver: TimeZoneResolver
  filters: CollectionFilters
  /** Gap-filled bucket range for the window; defines the series shape. */
  keys: PeriodKey[]
}

/**
 * Reduces a raw commit to its metric contribution, or null when it does
 * not qualify (an excluded merge, or no files matching the extension filter).
 */
export function toCommitStat(
  commit: RawCommit,
  filters: CollectionFilters,
): CommitStat | null {
  const isMerge = commit.parents.length > 1
  if (isMerge && !filters.includeMerges) return null

  const files = filterFiles(commit.files, filters.extensions)
  if (filters.extensions.length > 0 && files.length === 0) return null

  let additions = 0
  let deletions = 0
  for (const file of files) {
    additions += file.additions
    deletions += file.deletions
  }
  return {
    authoredAt: commit.authoredAt,
    additions,
    deletions,
    filesChanged: files.length,
    commits: 1,
    isMerge,
  }
}

/** Collects one repository's gap-filled series. */
export class CollectorService {
  private readerFor: ReaderFactory

  /** @param readerFor - Opens a history reader for a repository path. */
  constructor(readerFor: ReaderFactory) {
    this.readerFor = readerFor
  }

  /**
   * Walks the repository and folds qualifying commits into buckets.
   * Never rejects: failures come back as a `failed` result.
   */
  async collect(
    repo: RepositorySpec,
    request: CollectionRequest,
  ): Promise<RepositoryResult> {
    try {
      const { series, activity } = await this.walk(repo, request)
      return {
        status: "ok",
        name: repo.name,
        path: repo.path,
        series,
        activity,
      }
    } catch (err) {
      const error =
        err instanceof CollectionError
          ? err
          : new ReadFailureError(repo.name, repo.path, err)
      return { status: "failed", name: repo.name, path: repo.path, error }
    }
  }

  private async walk(
    repo: RepositorySpec,
    request: CollectionRequest,
  ): Promise<{ series: Series; activity: ActivityStats }> {
    const reader = this.readerFor(repo.path)
    if (!(await reader.isRepository())) {
      throw new NotARepositoryError(repo.name, repo.path)
    }

    const branch = request.filters.branch ?? repo.branch
    if (branch !== undefined) {
      if (!(await reader.refExists(branch))) {
        throw new BranchNotFoundError(repo.name, repo.path, branch)
      }
    } else if (!(await reader.hasCommits())) {
      return {
        series: fillSeries(request.keys, new Map()),
        activity: emptyActivity(),
      }
    }

    // Fetch a day early: git filters by UTC instant, the window is local days.
    const fetchFrom = dayToDate(shiftDay(request.window.since, -1))
    const since = new Date(fetchFrom.getTime())
    const commits = await reader.listCommits(branch ?? "HEAD", since)

    const { resolver, window, period } = request
    const buckets = new Map<string, BucketValue>()
    const activity = emptyActivity()
    for (const commit of commits) {
      const stat = toCommitStat(commit, request.filters)
      if (!stat) continue

      const day = resolver.calendarDate(stat.authoredAt)
      if (day < window.since || day > window.until) continue

      const start = periodKeyFor(day, period).start
      const bucket = buckets.get(start) ?? emptyBucket()
      buckets.set(start, foldCommit(bucket, stat))
      activity.weekday[resolver.weekdayIndex(stat.authoredAt)] += 1
      activity.hourly[resolver.hour(stat.authoredAt)] += 1
    }

    return { series: fillSeries(request.keys, buckets), activity }
  }
}

/** Lays buckets over the full key range; missing keys become zero buckets. */
export function fillSeries(
  keys: readonly PeriodKey[],
  buckets: ReadonlyMap<string, BucketValue>,
): Series {
  return keys.map((key) => ({
    key,
    value: buckets.get(key.start) ?? emptyBucket(),
  }))
}

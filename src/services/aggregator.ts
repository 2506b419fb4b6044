import { AllRepositoriesFailedError, NoRepositoriesError } from "@/errors"
import type {
  AggregatedSnapshot,
  AggregationOutcome,
  AggregationProgress,
  CollectionFilters,
  DateWindow,
  Period,
  RepositoryFailure,
  RepositoryResult,
  RepositorySpec,
  Series,
} from "@/types"
import type { CollectorService } from "@services/collector"
import { defaultConcurrency, mapPool } from "@services/pool"
import {
  emptyActivity,
  emptyBucket,
  mergeActivity,
  mergeBuckets,
  totalOf,
} from "@stats/bucket"
import { periodRange } from "@stats/period"
import type { TimeZoneResolver } from "@stats/timezone"

/** What to aggregate, shared by every repository in a run. */
export interface AggregationQuery {
  window: DateWindow
  period: Period
  resolver: TimeZoneResolver
  filters: CollectionFilters
}

type SuccessfulResult = Extract<RepositoryResult, { status: "ok" }>

/** Sums series bucket by bucket. Every input must share the same key range. */
export function mergeSeries(base: Series, others: readonly Series[]): Series {
  return base.map((entry, i) => ({
    key: entry.key,
    value: others.reduce(
      (sum, series) => mergeBuckets(sum, series[i]?.value ?? emptyBucket()),
      entry.value,
    ),
  }))
}

/**
 * Fans collection out over a bounded worker pool and merges the successful
 * results into one snapshot.
 */
export class AggregatorService {
  private collector: CollectorService
  private concurrency: number

  /**
   * @param collector - Collects a single repository.
   * @param concurrency - Maximum repositories collected at once.
   */
  constructor(
    collector: CollectorService,
    concurrency: number = defaultConcurrency(),
  ) {
    this.collector = collector
    this.concurrency = concurrency
  }

  /**
   * Collects every repository and merges the results.
   * Throws NoRepositoriesError for an empty list and AllRepositoriesFailedError
   * when nothing could be collected.
   */
  async aggregate(
    repos: readonly RepositorySpec[],
    query: AggregationQuery,
    onProgress?: (progress: AggregationProgress) => void,
  ): Promise<AggregationOutcome> {
    if (repos.length === 0) throw new NoRepositoriesError()

    const keys = periodRange(query.window, query.period)
    let completed = 0
    onProgress?.({ completed, total: repos.length })

    const results = await mapPool(repos, this.concurrency, async (repo) => {
      const result = await this.collector.collect(repo, { ...query, keys })
      completed++
      onProgress?.({ completed, total: repos.length, current: repo.name })
      return result
    })

    const succeeded: SuccessfulResult[] = []
    const failures: RepositoryFailure[] = []
    for (const result of results) {
      if (result.status === "ok") succeeded.push(result)
      else failures.push(result)
    }
    if (succeeded.length === 0) throw new AllRepositoriesFailedError(failures)

    const series = mergeSeries(
      keys.map((key) => ({ key, value: emptyBucket() })),
      succeeded.map((r) => r.series),
    )
    const snapshot: AggregatedSnapshot = {
      repositories: succeeded.map((r) => r.name),
      period: query.period,
      timeZone: query.resolver.label,
      window: query.window,
      series,
      total: totalOf(series),
      activity: succeeded.reduce(
        (sum, r) => mergeActivity(sum, r.activity),
        emptyActivity(),
      ),
    }
    return { snapshot, failures }
  }
}

import { describe, expect, test } from "vitest"

import type { CommitStat } from "@/types"
import {
  emptyActivity,
  emptyBucket,
  foldCommit,
  mergeActivity,
  mergeBuckets,
  totalOf,
} from "@stats/bucket"

function stat(additions: number, deletions: number, files: number): CommitStat {
  return {
    authoredAt: new Date("2024-03-01T00:00:00Z"),
    additions,
    deletions,
    filesChanged: files,
    commits: 1,
    isMerge: false,
  }
}

describe("foldCommit", () => {
  test("accumulates every metric, with net lines going negative", () => {
    const first = foldCommit(emptyBucket(), stat(3, 1, 2))
    const bucket = foldCommit(first, stat(0, 10, 1))
    expect(bucket).toEqual({
      commits: 2,
      additions: 3,
      deletions: 11,
      netLines: -8,
      filesChanged: 3,
    })
  })

  test("does not mutate its input", () => {
    const bucket = emptyBucket()
    foldCommit(bucket, stat(1, 1, 1))
    expect(bucket).toEqual(emptyBucket())
  })
})

describe("mergeBuckets", () => {
  test("is commutative", () => {
    const a = foldCommit(emptyBucket(), stat(5, 2, 1))
    const b = foldCommit(emptyBucket(), stat(1, 7, 4))
    expect(mergeBuckets(a, b)).toEqual(mergeBuckets(b, a))
    expect(mergeBuckets(a, b)).toEqual({
      commits: 2,
      additions: 6,
      deletions: 9,
      netLines: -3,
      filesChanged: 5,
    })
  })
})

describe("totalOf", () => {
  test("sums a series", () => {
    const value = foldCommit(emptyBucket(), stat(2, 1, 1))
    const key = (day: string) => ({ start: day, label: day })
    const total = totalOf([
      { key: key("2024-03-01"), value },
      { key: key("2024-03-02"), value: emptyBucket() },
      { key: key("2024-03-03"), value },
    ])
    expect(total).toEqual({
      commits: 2,
      additions: 4,
      deletions: 2,
      netLines: 2,
      filesChanged: 2,
    })
  })

  test("an empty series totals zero", () => {
    expect(totalOf([])).toEqual(emptyBucket())
  })
})

describe("activity", () => {
  test("starts with 7 weekday and 24 hour slots", () => {
    const activity = emptyActivity()
    expect(activity.weekday).toHaveLength(7)
    expect(activity.hourly).toHaveLength(24)
    expect(activity.weekday.every((n) => n === 0)).toBe(true)
  })

  test("merges slot by slot", () => {
    const a = emptyActivity()
    a.weekday[0] = 2
    a.hourly[9] = 1
    const b = emptyActivity()
    b.weekday[0] = 1
    b.hourly[23] = 4
    const merged = mergeActivity(a, b)
    expect(merged.weekday[0]).toBe(3)
    expect(merged.hourly[9]).toBe(1)
    expect(merged.hourly[23]).toBe(4)
  })
})

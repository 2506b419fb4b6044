import { describe, expect, test } from "vitest"

import { ConfigError, ValidationError } from "@/errors"
import { buildQuery } from "@commands/analyze/request"

const NOW = new Date("2024-03-10T12:00:00Z")

describe("buildQuery", () => {
  test("defaults to a daily week ending today", () => {
    const query = buildQuery({ timezone: "utc" }, {}, NOW)
    expect(query.window).toEqual({ since: "2024-03-03", until: "2024-03-10" })
    expect(query.period).toBe("daily")
    expect(query.resolver.label).toBe("UTC")
    expect(query.filters).toEqual({ extensions: [], includeMerges: false })
  })

  test("--days sets the window length", () => {
    const query = buildQuery({ timezone: "utc", days: 30 }, {}, NOW)
    expect(query.window).toEqual({ since: "2024-02-09", until: "2024-03-10" })
  })

  test("today is taken in the requested zone", () => {
    const late = new Date("2024-03-10T23:30:00Z")
    const query = buildQuery({ timezone: "Asia/Tokyo", days: 1 }, {}, late)
    expect(query.window).toEqual({ since: "2024-03-10", until: "2024-03-11" })
    expect(query.resolver.label).toBe("Asia/Tokyo")
  })

  test("--from and --to override --days", () => {
    const query = buildQuery(
      { timezone: "utc", days: 3, from: "2024-01-01", to: "2024-01-31" },
      {},
      NOW,
    )
    expect(query.window).toEqual({ since: "2024-01-01", until: "2024-01-31" })
  })

  test("--to alone counts --days back from it", () => {
    const query = buildQuery(
      { timezone: "utc", days: 3, to: "2024-02-10" },
      {},
      NOW,
    )
    expect(query.window).toEqual({ since: "2024-02-07", until: "2024-02-10" })
  })

  test("--from alone runs until today", () => {
    const query = buildQuery({ timezone: "utc", from: "2024-03-01" }, {}, NOW)
    expect(query.window).toEqual({ since: "2024-03-01", until: "2024-03-10" })
  })

  test("a single-day window is allowed", () => {
    const query = buildQuery(
      { timezone: "utc", from: "2024-03-05", to: "2024-03-05" },
      {},
      NOW,
    )
    expect(query.window).toEqual({ since: "2024-03-05", until: "2024-03-05" })
  })

  test("rejects --from after --to", () => {
    expect(() =>
      buildQuery({ timezone: "utc", from: "2024-03-05", to: "2024-03-01" }),
    ).toThrow(ValidationError)
    expect(() =>
      buildQuery({ timezone: "utc", from: "2024-03-05", to: "2024-03-01" }),
    ).toThrow("--from (2024-03-05) must not be after --to (2024-03-01)")
  })

  test("rejects an unknown timezone", () => {
    expect(() => buildQuery({ timezone: "Mars/Olympus" })).toThrow(ConfigError)
  })

  test("applies config defaults when flags are absent", () => {
    const query = buildQuery(
      {},
      {
        days: 14,
        period: "weekly",
        timezone: "UTC",
        includeMerges: true,
        extensions: [".TS", "md"],
      },
      NOW,
    )
    expect(query.window).toEqual({ since: "2024-02-25", until: "2024-03-10" })
    expect(query.period).toBe("weekly")
    expect(query.filters).toEqual({
      extensions: ["ts", "md"],
      includeMerges: true,
    })
  })

  test("flags win over config defaults", () => {
    const query = buildQuery(
      {
        period: "monthly",
        timezone: "utc",
        ext: ["rs"],
        includeMerges: true,
        branch: "release",
      },
      { period: "weekly", timezone: "Europe/Berlin", extensions: ["ts"] },
      NOW,
    )
    expect(query.period).toBe("monthly")
    expect(query.resolver.label).toBe("UTC")
    expect(query.filters).toEqual({
      branch: "release",
      extensions: ["rs"],
      includeMerges: true,
    })
  })
})

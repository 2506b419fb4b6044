import type { ConfigDefaults } from "@/config"
import { ValidationError } from "@/errors"
import { normalizeExtensions } from "@/file-filter"
import type { DateWindow, Period } from "@/types"
import type { AggregationQuery } from "@services/aggregator"
import { shiftDay, windowEndingToday } from "@stats/period"
import {
  type TimeZoneResolver,
  createResolver,
  parseTimeZone,
  today,
} from "@stats/timezone"

export const DEFAULT_DAYS = 7

/** Analysis flags as parsed by the command line. */
export interface AnalyzeFlags {
  days?: number
  from?: string
  to?: string
  period?: Period
  branch?: string
  ext?: string[]
  includeMerges?: boolean
  timezone?: string
}

function resolveWindow(
  flags: AnalyzeFlags,
  days: number,
  resolver: TimeZoneResolver,
  now: Date,
): DateWindow {
  if (flags.from === undefined && flags.to === undefined) {
    return windowEndingToday(resolver, days, now)
  }
  const until = flags.to ?? today(resolver, now)
  const since = flags.from ?? shiftDay(until, -days)
  if (since > until) {
    throw new ValidationError(
      `--from (${since}) must not be after --to (${until})`,
    )
  }
  return { since, until }
}

/**
 * Turns command-line flags into an aggregation query. Flags win over config
 * defaults; the timezone is validated before anything is collected.
 */
export function buildQuery(
  flags: AnalyzeFlags,
  defaults: ConfigDefaults = {},
  now: Date = new Date(),
): AggregationQuery {
  const resolver = createResolver(
    parseTimeZone(flags.timezone ?? defaults.timezone ?? "local"),
  )
  const days = flags.days ?? defaults.days ?? DEFAULT_DAYS
  return {
    window: resolveWindow(flags, days, resolver, now),
    period: flags.period ?? defaults.period ?? "daily",
    resolver,
    filters: {
      branch: flags.branch,
      extensions: normalizeExtensions(flags.ext ?? defaults.extensions ?? []),
      includeMerges: flags.includeMerges ?? defaults.includeMerges ?? false,
    },
  }
}

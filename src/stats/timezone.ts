import { TZDate } from "@date-fns/tz"
import { format, getHours, getISODay, isValid } from "date-fns"

import { ConfigError } from "@/errors"

/** How instants are mapped onto calendar dates. */
export type TimeZoneMode =
  | { kind: "local" }
  | { kind: "utc" }
  | { kind: "named"; name: string }

/**
 * Maps UTC instants onto wall-clock values in one timezone.
 *
 * Offsets are looked up per instant, so two instants 24 hours apart may land
 * on the same calendar date (fall back) or skip one (spring forward).
 */
export interface TimeZoneResolver {
  /** `local`, `UTC`, or the IANA zone name. */
  readonly label: string
  /** The instant as a Date whose getters read wall-clock time in this zone. */
  zoned(instant: Date): Date
  /** Calendar date of the instant in this zone, as YYYY-MM-DD. */
  calendarDate(instant: Date): string
  /** ISO weekday index of the instant, 0 = Monday ... 6 = Sunday. */
  weekdayIndex(instant: Date): number
  /** Hour of day (0-23) of the instant. */
  hour(instant: Date): number
}

const HINT = 'use "local", "utc", or an IANA name such as "Europe/Berlin"'

function isKnownZone(name: string): boolean {
  try {
    return isValid(new TZDate(Date.now(), name))
  } catch (err) {
    if (err instanceof RangeError) return false
    throw err
  }
}

/** Parses a `--timezone` selector. Throws ConfigError for unknown zones. */
export function parseTimeZone(input: string): TimeZoneMode {
  const value = input.trim()
  const lower = value.toLowerCase()
  if (lower === "local") return { kind: "local" }
  if (lower === "utc") return { kind: "utc" }
  if (value === "" || !isKnownZone(value)) {
    throw new ConfigError(`invalid timezone: ${input}`, HINT)
  }
  return { kind: "named", name: value }
}

/** Builds a resolver for the given mode. */
export function createResolver(mode: TimeZoneMode): TimeZoneResolver {
  let label: string
  let zoned: (instant: Date) => Date
  switch (mode.kind) {
    case "local":
      label = "local"
      zoned = (instant) => new Date(instant.getTime())
      break
    case "utc":
      label = "UTC"
      zoned = (instant) => new TZDate(instant.getTime(), "UTC")
      break
    case "named": {
      const name = mode.name
      label = name
      zoned = (instant) => new TZDate(instant.getTime(), name)
      break
    }
  }

  return {
    label,
    zoned,
    calendarDate: (instant) => format(zoned(instant), "yyyy-MM-dd"),
    weekdayIndex: (instant) => getISODay(zoned(instant)) - 1,
    hour: (instant) => getHours(zoned(instant)),
  }
}

/** Today's calendar date in the resolver's zone. */
export function today(
  resolver: TimeZoneResolver,
  now: Date = new Date(),
): string {
  return resolver.calendarDate(now)
}

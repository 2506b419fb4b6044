import { TZDate } from "@date-fns/tz"
import {
  addDays,
  addMonths,
  addWeeks,
  addYears,
  format,
  getISOWeek,
  getISOWeekYear,
  startOfISOWeek,
  subDays,
} from "date-fns"

import type { DateWindow, Period, PeriodKey } from "@/types"
import { today, type TimeZoneResolver } from "@stats/timezone"

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * Turns a YYYY-MM-DD calendar day into a date pinned to UTC midnight.
 * Calendar arithmetic on days is done in UTC so it never crosses a DST shift.
 */
export function dayToDate(day: string): TZDate {
  const match = DAY_PATTERN.exec(day)
  if (!match) throw new RangeError(`not a calendar day: ${day}`)
  const [, year, month, date] = match
  return new TZDate(
    Date.UTC(Number(year), Number(month) - 1, Number(date)),
    "UTC",
  )
}

function formatDay(date: Date): string {
  return format(date, "yyyy-MM-dd")
}

/** Adds (or subtracts) whole days to a calendar day. */
export function shiftDay(day: string, amount: number): string {
  return formatDay(addDays(dayToDate(day), amount))
}

/** Bucket containing the given calendar day. */
export function periodKeyFor(day: string, period: Period): PeriodKey {
  const date = dayToDate(day)
  switch (period) {
    case "daily":
      return { start: day, label: day }
    case "weekly": {
      const week = String(getISOWeek(date)).padStart(2, "0")
      return {
        start: formatDay(startOfISOWeek(date)),
        label: `${getISOWeekYear(date)}-W${week}`,
      }
    }
    case "monthly":
      return {
        start: format(date, "yyyy-MM-01"),
        label: format(date, "yyyy-MM"),
      }
    case "yearly":
      return {
        start: format(date, "yyyy-01-01"),
        label: format(date, "yyyy"),
      }
  }
}

function nextStart(start: TZDate, period: Period): TZDate {
  switch (period) {
    case "daily":
      return addDays(start, 1)
    case "weekly":
      return addWeeks(start, 1)
    case "monthly":
      return addMonths(start, 1)
    case "yearly":
      return addYears(start, 1)
  }
}

/**
 * Every bucket overlapping the window, ascending, with no gaps.
 * Partial periods at either edge are included.
 */
export function periodRange(window: DateWindow, period: Period): PeriodKey[] {
  if (window.since > window.until) return []

  const keys: PeriodKey[] = []
  let cursor = dayToDate(periodKeyFor(window.since, period).start)
  let day = formatDay(cursor)
  while (day <= window.until) {
    keys.push(periodKeyFor(day, period))
    cursor = nextStart(cursor, period)
    day = formatDay(cursor)
  }
  return keys
}

/** Window covering `[today - days, today]` in the resolver's zone. */
export function windowEndingToday(
  resolver: TimeZoneResolver,
  days: number,
  now: Date = new Date(),
): DateWindow {
  const until = today(resolver, now)
  return { since: formatDay(subDays(dayToDate(until), days)), until }
}

import { InvalidArgumentError } from "commander"
import { z } from "zod"

const isoDate = z.iso.date()

export function parsePositiveInt(value: string): number {
  const n = parseInt(value, 10)
  if (isNaN(n) || n < 1) {
    throw new InvalidArgumentError("must be a positive integer")
  }
  return n
}

/** Splits a comma-separated option value, dropping empty items. */
export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

/** Accepts a calendar date written as YYYY-MM-DD. */
export function parseIsoDate(value: string): string {
  const result = isoDate.safeParse(value.trim())
  if (!result.success) {
    throw new InvalidArgumentError("must be a date in YYYY-MM-DD format")
  }
  return result.data
}

/** Builds a parser that accepts exactly one of `choices`. */
export function parseChoice<T extends string>(
  choices: readonly T[],
): (value: string) => T {
  return (value) => {
    const match = choices.find((choice) => choice === value.toLowerCase())
    if (match === undefined) {
      throw new InvalidArgumentError(`must be one of: ${choices.join(", ")}`)
    }
    return match
  }
}

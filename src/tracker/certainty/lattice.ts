import { InvalidCertaintyError } from "../errors"
import { DATE_CERTAINTIES, type DateCertainty } from "../types"

// Index in DATE_CERTAINTIES is the rank: unknown < month < week < day < exact < time_confirmed
const RANKS: ReadonlyMap<string, number> = new Map(DATE_CERTAINTIES.map((level, index) => [level, index]))

export function isDateCertainty(value: unknown): value is DateCertainty {
  return typeof value === "string" && RANKS.has(value)
}

export function rank(level: string): number {
  const position = RANKS.get(level)
  if (position === undefined) throw new InvalidCertaintyError(level)
  return position
}

export function parseCertainty(level: string): DateCertainty {
  if (!isDateCertainty(level)) throw new InvalidCertaintyError(level)
  return level
}

/**
 * True when `next` is at least as precise as `current`. Equal rank counts, so a
 * corrected value at the same precision still applies.
 */
export function isRefinement(current: string, next: string): boolean {
  return rank(next) >= rank(current)
}

export function compareCertainty(a: string, b: string): number {
  return rank(a) - rank(b)
}

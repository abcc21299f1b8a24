import { isRefinement, parseCertainty } from "../certainty/lattice"
import { appendDateHistory, assertDateRange, toTimestamp, type TimestampInput } from "../records/commitment"
import type { Commitment, DateCertainty } from "../types"

export interface DateObservation {
  start: TimestampInput
  end?: TimestampInput
  certainty: string
  source: string
}

export interface GatedRefinement {
  commitment: Commitment
  applied: boolean
}

interface NormalizedObservation {
  start: string
  end?: string
  certainty: DateCertainty
  source: string
}

function normalize(observation: DateObservation, timezone: string | undefined): NormalizedObservation {
  const start = toTimestamp(observation.start, "start_date", timezone)
  const end = observation.end === undefined ? undefined : toTimestamp(observation.end, "end_date", timezone)
  assertDateRange(start, end)
  return {
    start,
    end,
    certainty: parseCertainty(observation.certainty),
    source: observation.source,
  }
}

export function formatDateInfo(start: string, end?: string): string {
  return end ? `${start} to ${end}` : start
}

function overwrite(record: Commitment, observation: NormalizedObservation, now: Date): Commitment {
  // A kept end_date earlier than the new start is dropped.
  const keptEnd =
    record.end_date !== undefined && Date.parse(record.end_date) >= Date.parse(observation.start) ? record.end_date : undefined
  const end_date = observation.end ?? keptEnd

  const withHistory = appendDateHistory(record, formatDateInfo(observation.start, observation.end), observation.source, now)
  return {
    ...withHistory,
    start_date: observation.start,
    end_date,
    date_certainty: observation.certainty,
  }
}

/**
 * Last-writer-wins date refinement. History is appended for every call, the
 * start date and certainty are always overwritten, and the end date when the
 * observation carries one or the kept one now precedes the start. A date-time
 * without an offset is read in the record's timezone. The lattice is not
 * consulted.
 */
export function refine(record: Commitment, observation: DateObservation, now: Date = new Date()): Commitment {
  return overwrite(record, normalize(observation, record.timezone), now)
}

/**
 * Like `refine`, but fields are only overwritten when the observation is at
 * least as certain as what the record holds. A less certain observation is
 * still recorded in the history.
 */
export function refineIfMoreCertain(record: Commitment, observation: DateObservation, now: Date = new Date()): GatedRefinement {
  const normalized = normalize(observation, record.timezone)
  if (isRefinement(record.date_certainty, normalized.certainty)) {
    return { commitment: overwrite(record, normalized, now), applied: true }
  }

  return {
    commitment: appendDateHistory(record, formatDateInfo(normalized.start, normalized.end), normalized.source, now),
    applied: false,
  }
}

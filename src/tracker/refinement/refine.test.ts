import { describe, expect, test } from "vitest"
import { InvalidCertaintyError } from "../errors"
import { createCommitmentRecord } from "../records/commitment"
import type { Commitment } from "../types"
import { formatDateInfo, refine, refineIfMoreCertain } from "./refine"

const CREATED = new Date("2025-11-01T12:00:00.000Z")
const FIRST = new Date("2025-11-05T08:00:00.000Z")
const SECOND = new Date("2025-11-09T08:00:00.000Z")

function makeOffsite(): Commitment {
  return createCommitmentRecord(
    { title: "Team Offsite", commitment_type: "trip", date_certainty: "month", start_date: "2025-12-01" },
    CREATED,
  )
}

describe("tracker/refinement/refine", () => {
  test("formatDateInfo joins start and end", () => {
    expect(formatDateInfo("2025-12-15T00:00:00.000Z")).toBe("2025-12-15T00:00:00.000Z")
    expect(formatDateInfo("2025-12-15T00:00:00.000Z", "2025-12-17T00:00:00.000Z")).toBe(
      "2025-12-15T00:00:00.000Z to 2025-12-17T00:00:00.000Z",
    )
  })

  test("dates narrow and history grows as an offsite is refined twice", () => {
    // #given
    const offsite = makeOffsite()

    // #when
    const dayLevel = refine(offsite, { start: "2025-12-15", end: "2025-12-17", certainty: "day", source: "email-1" }, FIRST)

    // #then
    expect(dayLevel.metadata.date_history).toEqual([
      { date: "2025-12-15T00:00:00.000Z to 2025-12-17T00:00:00.000Z", source: "email-1", updated_at: "2025-11-05T08:00:00.000Z" },
    ])
    expect(dayLevel.start_date).toBe("2025-12-15T00:00:00.000Z")
    expect(dayLevel.end_date).toBe("2025-12-17T00:00:00.000Z")
    expect(dayLevel.date_certainty).toBe("day")

    // #when
    const exact = refine(dayLevel, { start: "2025-12-15T14:00", certainty: "exact", source: "email-2" }, SECOND)

    // #then
    expect(exact.metadata.date_history).toHaveLength(2)
    expect(exact.metadata.date_history[1]).toEqual({
      date: "2025-12-15T14:00:00.000Z",
      source: "email-2",
      updated_at: "2025-11-09T08:00:00.000Z",
    })
    expect(exact.start_date).toBe("2025-12-15T14:00:00.000Z")
    expect(exact.end_date).toBe("2025-12-17T00:00:00.000Z")
    expect(exact.date_certainty).toBe("exact")
    expect(exact.updated_at).toBe("2025-11-09T08:00:00.000Z")
    expect(exact.created_at).toBe("2025-11-01T12:00:00.000Z")
  })

  test("history grows even when the observation repeats current values", () => {
    // #given
    let record = makeOffsite()
    const observation = { start: "2025-12-01", certainty: "month", source: "email-dup" }

    // #when
    for (let i = 0; i < 3; i++) {
      record = refine(record, observation, FIRST)
    }

    // #then
    expect(record.metadata.date_history).toHaveLength(3)
    expect(record.start_date).toBe("2025-12-01T00:00:00.000Z")
  })

  test("blind refine accepts a less certain observation", () => {
    // #given
    const exact = refine(makeOffsite(), { start: "2025-12-15T14:00:00Z", certainty: "exact", source: "email-1" }, FIRST)

    // #when
    const vaguer = refine(exact, { start: "2025-12-01", certainty: "month", source: "email-2" }, SECOND)

    // #then
    expect(vaguer.date_certainty).toBe("month")
    expect(vaguer.start_date).toBe("2025-12-01T00:00:00.000Z")
  })

  test("a new start past the kept end drops the end and still records history", () => {
    // #given
    const ranged = refine(makeOffsite(), { start: "2025-12-15", end: "2025-12-17", certainty: "day", source: "email-1" }, FIRST)

    // #when
    const moved = refine(ranged, { start: "2025-12-20", certainty: "day", source: "email-2" }, SECOND)

    // #then
    expect(moved.metadata.date_history.map(e => e.date)).toEqual([
      "2025-12-15T00:00:00.000Z to 2025-12-17T00:00:00.000Z",
      "2025-12-20T00:00:00.000Z",
    ])
    expect(moved.start_date).toBe("2025-12-20T00:00:00.000Z")
    expect(moved.end_date).toBeUndefined()
  })

  test("a new start before the kept end keeps the end", () => {
    // #given
    const ranged = refine(makeOffsite(), { start: "2025-12-15", end: "2025-12-17", certainty: "day", source: "email-1" }, FIRST)

    // #when
    const moved = refine(ranged, { start: "2025-12-16", certainty: "day", source: "email-2" }, SECOND)

    // #then
    expect(moved.end_date).toBe("2025-12-17T00:00:00.000Z")
  })

  test("a date-time without an offset is read in the record's timezone", () => {
    // #given
    const berlin = createCommitmentRecord(
      { title: "Team Offsite", date_certainty: "day", start_date: "2025-12-15", timezone: "Europe/Berlin" },
      CREATED,
    )

    // #when
    const exact = refine(berlin, { start: "2025-12-15T14:00", certainty: "exact", source: "email-2" }, SECOND)

    // #then
    expect(exact.start_date).toBe("2025-12-15T13:00:00.000Z")
    expect(exact.metadata.date_history[0].date).toBe("2025-12-15T13:00:00.000Z")
  })

  test("throws ValidationError for an inverted observation range", () => {
    expect(() =>
      refine(makeOffsite(), { start: "2025-12-17", end: "2025-12-15", certainty: "day", source: "email-1" }, FIRST),
    ).toThrow("end_date 2025-12-15T00:00:00.000Z precedes start_date 2025-12-17T00:00:00.000Z")
  })

  test("throws InvalidCertaintyError for a certainty outside the lattice", () => {
    expect(() => refine(makeOffsite(), { start: "2025-12-15", certainty: "hour", source: "email-1" }, FIRST)).toThrow(
      InvalidCertaintyError,
    )
  })

  describe("refineIfMoreCertain", () => {
    test("applies an observation at least as certain", () => {
      // #when
      const result = refineIfMoreCertain(makeOffsite(), { start: "2025-12-15", certainty: "day", source: "email-1" }, FIRST)

      // #then
      expect(result.applied).toBe(true)
      expect(result.commitment.date_certainty).toBe("day")
      expect(result.commitment.start_date).toBe("2025-12-15T00:00:00.000Z")
    })

    test("applies an observation of equal certainty", () => {
      // #when
      const result = refineIfMoreCertain(makeOffsite(), { start: "2025-12-08", certainty: "month", source: "email-1" }, FIRST)

      // #then
      expect(result.applied).toBe(true)
      expect(result.commitment.start_date).toBe("2025-12-08T00:00:00.000Z")
    })

    test("records but does not apply a less certain observation", () => {
      // #given
      const day = refine(makeOffsite(), { start: "2025-12-15", certainty: "day", source: "email-1" }, FIRST)

      // #when
      const result = refineIfMoreCertain(day, { start: "2025-12-01", certainty: "month", source: "email-2" }, SECOND)

      // #then
      expect(result.applied).toBe(false)
      expect(result.commitment.date_certainty).toBe("day")
      expect(result.commitment.start_date).toBe("2025-12-15T00:00:00.000Z")
      expect(result.commitment.metadata.date_history.map(e => e.source)).toEqual(["email-1", "email-2"])
      expect(result.commitment.updated_at).toBe("2025-11-09T08:00:00.000Z")
    })
  })
})

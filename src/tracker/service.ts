import { logDebug } from "../shared/logger"
import { NotFoundError, ValidationError } from "./errors"
import { createLinkRegistry, type LinkCalendarEventOptions, type LinkEmailOptions } from "./links/link-registry"
import {
  assertDateRange,
  createCommitmentRecord,
  serializeCommitment,
  toTimestamp,
  updateCommitmentRecord,
  type CreateCommitmentInput,
  type TimestampInput,
  type UpdateCommitmentInput,
} from "./records/commitment"
import { refine as refineDates, refineIfMoreCertain, type DateObservation, type GatedRefinement } from "./refinement/refine"
import type { CommitmentDatabase } from "./store/types"
import type {
  CalendarEventLink,
  Commitment,
  CommitmentStatus,
  EmailLink,
  LinkCounts,
  SerializedCommitment,
} from "./types"

export interface CommitmentServiceOptions {
  clock?: () => Date
}

export interface DeletedCommitment extends LinkCounts {
  commitment_id: string
}

export interface CommitmentService {
  createCommitment(input: CreateCommitmentInput): Commitment
  get(id: string): Commitment | undefined
  /** Blind last-writer-wins refinement. */
  refine(id: string, observation: DateObservation): Commitment
  /** Applies the observation only when it is at least as certain; always records history. */
  refineGated(id: string, observation: DateObservation): GatedRefinement
  update(id: string, patch: UpdateCommitmentInput): Commitment
  complete(id: string): Commitment
  cancel(id: string): Commitment
  delete(id: string): DeletedCommitment
  linkEmail(id: string, messageId: string, options?: LinkEmailOptions): EmailLink
  linkCalendarEvent(id: string, eventId: string, options?: LinkCalendarEventOptions): CalendarEventLink
  serialize(id: string): SerializedCommitment
  list(): Commitment[]
  listByStatus(status: CommitmentStatus): Commitment[]
  listByType(type: string): Commitment[]
  listInRange(from: TimestampInput, to: TimestampInput): Commitment[]
  findByParticipant(email: string): Commitment[]
  findByMessage(messageId: string): Commitment[]
  findByEvent(eventId: string): Commitment[]
  listEmailLinks(id: string): EmailLink[]
  listCalendarEventLinks(id: string): CalendarEventLink[]
}

export function createCommitmentService(db: CommitmentDatabase, options: CommitmentServiceOptions = {}): CommitmentService {
  const clock = options.clock ?? (() => new Date())
  const links = createLinkRegistry(db, clock)

  function load(id: string): Commitment {
    const record = db.getCommitment(id)
    if (!record) throw new NotFoundError(id)
    return record
  }

  // Read, change and write one commitment inside a single IMMEDIATE transaction.
  function mutate<T>(id: string, change: (record: Commitment, now: Date) => { record: Commitment; result: T }): T {
    return db.transaction(() => {
      const { record, result } = change(load(id), clock())
      db.saveCommitment(record)
      return result
    })
  }

  function transition(id: string, status: Exclude<CommitmentStatus, "active">): Commitment {
    return mutate(id, (record, now) => {
      if (record.status !== "active") {
        throw new ValidationError(`Commitment ${id} is already ${record.status}`, "status")
      }
      const updated: Commitment = { ...record, status, updated_at: now.toISOString() }
      logDebug("Commitment status changed", { id, status })
      return { record: updated, result: updated }
    })
  }

  function resolveAll(ids: string[]): Commitment[] {
    const records: Commitment[] = []
    for (const id of new Set(ids)) {
      const record = db.getCommitment(id)
      if (record) records.push(record)
    }
    return records
  }

  return {
    createCommitment(input: CreateCommitmentInput): Commitment {
      const record = createCommitmentRecord(input, clock())
      db.insertCommitment(record)
      logDebug("Commitment created", { id: record.id, type: record.commitment_type, certainty: record.date_certainty })
      return record
    },

    get(id: string): Commitment | undefined {
      return db.getCommitment(id)
    },

    refine(id: string, observation: DateObservation): Commitment {
      return mutate(id, (record, now) => {
        const refined = refineDates(record, observation, now)
        logDebug("Commitment refined", { id, source: observation.source, certainty: refined.date_certainty })
        return { record: refined, result: refined }
      })
    },

    refineGated(id: string, observation: DateObservation): GatedRefinement {
      return mutate(id, (record, now) => {
        const outcome = refineIfMoreCertain(record, observation, now)
        logDebug(outcome.applied ? "Commitment refined" : "Refinement recorded without applying", {
          id,
          source: observation.source,
          certainty: observation.certainty,
        })
        return { record: outcome.commitment, result: outcome }
      })
    },

    update(id: string, patch: UpdateCommitmentInput): Commitment {
      return mutate(id, (record, now) => {
        const updated = updateCommitmentRecord(record, patch, now)
        return { record: updated, result: updated }
      })
    },

    complete(id: string): Commitment {
      return transition(id, "completed")
    },

    cancel(id: string): Commitment {
      return transition(id, "cancelled")
    },

    delete(id: string): DeletedCommitment {
      return db.transaction(() => {
        const counts = db.countLinks(id)
        if (!db.deleteCommitment(id)) throw new NotFoundError(id)
        logDebug("Commitment deleted", { id, ...counts })
        return { commitment_id: id, ...counts }
      })
    },

    linkEmail(id: string, messageId: string, linkOptions?: LinkEmailOptions): EmailLink {
      return links.linkEmail(id, messageId, linkOptions)
    },

    linkCalendarEvent(id: string, eventId: string, linkOptions?: LinkCalendarEventOptions): CalendarEventLink {
      return links.linkCalendarEvent(id, eventId, linkOptions)
    },

    serialize(id: string): SerializedCommitment {
      const record = load(id)
      return serializeCommitment(record, links.countLinks(id))
    },

    list(): Commitment[] {
      return db.listCommitments()
    },

    listByStatus(status: CommitmentStatus): Commitment[] {
      return db.listByStatus(status)
    },

    listByType(type: string): Commitment[] {
      return db.listByType(type)
    },

    listInRange(from: TimestampInput, to: TimestampInput): Commitment[] {
      const start = toTimestamp(from, "from")
      const end = toTimestamp(to, "to")
      assertDateRange(start, end)
      return db.listInRange(start, end)
    },

    findByParticipant(email: string): Commitment[] {
      return db.findByParticipant(email.trim())
    },

    findByMessage(messageId: string): Commitment[] {
      return resolveAll(links.findCommitmentIdsByMessage(messageId))
    },

    findByEvent(eventId: string): Commitment[] {
      return resolveAll(links.findCommitmentIdsByEvent(eventId))
    },

    listEmailLinks(id: string): EmailLink[] {
      load(id)
      return links.listEmailLinks(id)
    },

    listCalendarEventLinks(id: string): CalendarEventLink[] {
      load(id)
      return links.listCalendarEventLinks(id)
    },
  }
}

import { ulid } from "ulid"
import { createLinkProvenance, type CreateLinkProvenanceOptions } from "../../shared/provenance"
import { DuplicateLinkError, NotFoundError, ValidationError } from "../errors"
import { isSqliteConstraint } from "../store/db"
import type { CommitmentDatabase } from "../store/types"
import type { CalendarEventLink, EmailLink, LinkCounts, LinkKind } from "../types"

export type LinkEmailOptions = CreateLinkProvenanceOptions

export interface LinkCalendarEventOptions extends CreateLinkProvenanceOptions {
  event_data?: Record<string, unknown>
}

export interface LinkRegistry {
  linkEmail(commitmentId: string, messageId: string, options?: LinkEmailOptions): EmailLink
  linkCalendarEvent(commitmentId: string, eventId: string, options?: LinkCalendarEventOptions): CalendarEventLink
  listEmailLinks(commitmentId: string): EmailLink[]
  listCalendarEventLinks(commitmentId: string): CalendarEventLink[]
  findCommitmentIdsByMessage(messageId: string): string[]
  findCommitmentIdsByEvent(eventId: string): string[]
  countLinks(commitmentId: string): LinkCounts
}

function requireSourceId(value: string, field: "message_id" | "event_id"): string {
  const trimmed = value.trim()
  if (trimmed.length === 0) throw new ValidationError(`${field} is required`, field)
  return trimmed
}

export function createLinkRegistry(db: CommitmentDatabase, clock: () => Date = () => new Date()): LinkRegistry {
  // The unique index and the foreign key decide; there is no lookup before the insert.
  function insertOwned(kind: LinkKind, commitmentId: string, sourceId: string, insert: () => void): void {
    try {
      insert()
    } catch (error) {
      if (isSqliteConstraint(error, "SQLITE_CONSTRAINT_UNIQUE")) {
        throw new DuplicateLinkError(kind, commitmentId, sourceId)
      }
      if (isSqliteConstraint(error, "SQLITE_CONSTRAINT_FOREIGNKEY")) {
        throw new NotFoundError(commitmentId)
      }
      throw error
    }
  }

  function markAutoLinked(commitmentId: string, now: Date): void {
    const commitment = db.getCommitment(commitmentId)
    if (!commitment || commitment.auto_linked) return
    db.saveCommitment({ ...commitment, auto_linked: true, updated_at: now.toISOString() })
  }

  return {
    linkEmail(commitmentId: string, messageId: string, options: LinkEmailOptions = {}): EmailLink {
      const now = clock()
      const link: EmailLink = {
        id: ulid(now.getTime()),
        commitment_id: commitmentId,
        message_id: requireSourceId(messageId, "message_id"),
        ...createLinkProvenance(options, now),
      }

      return db.transaction(() => {
        insertOwned("email", commitmentId, link.message_id, () => db.insertEmailLink(link))
        if (link.linked_by === "ai") markAutoLinked(commitmentId, now)
        return link
      })
    },

    linkCalendarEvent(commitmentId: string, eventId: string, options: LinkCalendarEventOptions = {}): CalendarEventLink {
      const now = clock()
      const link: CalendarEventLink = {
        id: ulid(now.getTime()),
        commitment_id: commitmentId,
        event_id: requireSourceId(eventId, "event_id"),
        event_data: options.event_data,
        ...createLinkProvenance(options, now),
      }

      return db.transaction(() => {
        insertOwned("calendar_event", commitmentId, link.event_id, () => db.insertCalendarEventLink(link))
        if (link.linked_by === "ai") markAutoLinked(commitmentId, now)
        return link
      })
    },

    listEmailLinks(commitmentId: string): EmailLink[] {
      return db.listEmailLinks(commitmentId)
    },

    listCalendarEventLinks(commitmentId: string): CalendarEventLink[] {
      return db.listCalendarEventLinks(commitmentId)
    },

    findCommitmentIdsByMessage(messageId: string): string[] {
      return db.findCommitmentIdsByMessage(messageId)
    },

    findCommitmentIdsByEvent(eventId: string): string[] {
      return db.findCommitmentIdsByEvent(eventId)
    },

    countLinks(commitmentId: string): LinkCounts {
      return db.countLinks(commitmentId)
    },
  }
}

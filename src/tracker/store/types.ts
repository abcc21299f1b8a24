import type { Database as SqliteDatabase } from "better-sqlite3"
import type { CalendarEventLink, Commitment, CommitmentStatus, EmailLink, LinkCounts } from "../types"

export interface DatabaseStats {
  commitments: number
  emailLinks: number
  calendarEventLinks: number
}

export interface CommitmentDatabase {
  readonly raw: SqliteDatabase
  close(): void
  /** Runs `fn` in an IMMEDIATE transaction; concurrent writers wait on the database lock. */
  transaction<T>(fn: () => T): T

  insertCommitment(record: Commitment): void
  getCommitment(id: string): Commitment | undefined
  saveCommitment(record: Commitment): void
  deleteCommitment(id: string): boolean
  listCommitments(): Commitment[]
  listByStatus(status: CommitmentStatus): Commitment[]
  listByType(type: string): Commitment[]
  listInRange(from: string, to: string): Commitment[]
  findByParticipant(email: string): Commitment[]

  insertEmailLink(link: EmailLink): void
  insertCalendarEventLink(link: CalendarEventLink): void
  listEmailLinks(commitmentId: string): EmailLink[]
  listCalendarEventLinks(commitmentId: string): CalendarEventLink[]
  findCommitmentIdsByMessage(messageId: string): string[]
  findCommitmentIdsByEvent(eventId: string): string[]
  countLinks(commitmentId: string): LinkCounts

  getStats(): DatabaseStats
}

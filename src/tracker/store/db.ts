import { mkdirSync } from "node:fs"
import { dirname } from "node:path"
import Database from "better-sqlite3"
import { DATE_CERTAINTIES, COMMITMENT_STATUSES, LINKED_BY_VALUES } from "../types"
import type {
  CalendarEventLink,
  Commitment,
  CommitmentMetadata,
  CommitmentStatus,
  DateCertainty,
  EmailLink,
  LinkCounts,
  LinkedBy,
  Participant,
} from "../types"
import type { TrackerPaths } from "./paths"
import type { CommitmentDatabase, DatabaseStats } from "./types"

interface CommitmentRow {
  id: string
  title: string
  description: string | null
  commitment_type: string
  status: CommitmentStatus
  start_date: string | null
  end_date: string | null
  timezone: string | null
  date_certainty: DateCertainty
  participants: string
  organizer: string | null
  location: string | null
  meeting_links: string
  auto_linked: number
  confidence_score: number | null
  metadata: string
  created_at: string
  updated_at: string
}

interface EmailLinkRow {
  id: string
  commitment_id: string
  message_id: string
  linked_at: string
  linked_by: LinkedBy
  confidence_score: number | null
  link_reason: string | null
}

interface CalendarEventLinkRow {
  id: string
  commitment_id: string
  event_id: string
  event_data: string | null
  linked_at: string
  linked_by: LinkedBy
  confidence_score: number | null
  link_reason: string | null
}

interface CommitmentIdRow {
  commitment_id: string
}

interface CountRow {
  count: number
}

function sqlList(values: readonly string[]): string {
  return values.map(v => `'${v}'`).join(", ")
}

export function isSqliteConstraint(error: unknown, code: "SQLITE_CONSTRAINT_UNIQUE" | "SQLITE_CONSTRAINT_FOREIGNKEY"): boolean {
  return error instanceof Database.SqliteError && error.code === code
}

function toCommitmentRow(record: Commitment): CommitmentRow {
  return {
    id: record.id,
    title: record.title,
    description: record.description ?? null,
    commitment_type: record.commitment_type,
    status: record.status,
    start_date: record.start_date ?? null,
    end_date: record.end_date ?? null,
    timezone: record.timezone ?? null,
    date_certainty: record.date_certainty,
    participants: JSON.stringify(record.participants),
    organizer: record.organizer ?? null,
    location: record.location ?? null,
    meeting_links: JSON.stringify(record.meeting_links),
    auto_linked: record.auto_linked ? 1 : 0,
    confidence_score: record.confidence_score ?? null,
    metadata: JSON.stringify(record.metadata),
    created_at: record.created_at,
    updated_at: record.updated_at,
  }
}

function toCommitment(row: CommitmentRow): Commitment {
  const metadata = JSON.parse(row.metadata) as Partial<CommitmentMetadata>
  return {
    id: row.id,
    title: row.title,
    description: row.description ?? undefined,
    commitment_type: row.commitment_type,
    status: row.status,
    start_date: row.start_date ?? undefined,
    end_date: row.end_date ?? undefined,
    timezone: row.timezone ?? undefined,
    date_certainty: row.date_certainty,
    participants: JSON.parse(row.participants) as Participant[],
    organizer: row.organizer ?? undefined,
    location: row.location ?? undefined,
    meeting_links: JSON.parse(row.meeting_links) as string[],
    auto_linked: row.auto_linked === 1,
    confidence_score: row.confidence_score ?? undefined,
    metadata: {
      date_history: metadata.date_history ?? [],
      attachments: metadata.attachments ?? [],
      project: metadata.project,
      tags: metadata.tags ?? [],
    },
    created_at: row.created_at,
    updated_at: row.updated_at,
  }
}

function toEmailLink(row: EmailLinkRow): EmailLink {
  return {
    id: row.id,
    commitment_id: row.commitment_id,
    message_id: row.message_id,
    linked_at: row.linked_at,
    linked_by: row.linked_by,
    confidence_score: row.confidence_score ?? undefined,
    link_reason: row.link_reason ?? undefined,
  }
}

function toCalendarEventLink(row: CalendarEventLinkRow): CalendarEventLink {
  return {
    id: row.id,
    commitment_id: row.commitment_id,
    event_id: row.event_id,
    event_data: row.event_data === null ? undefined : (JSON.parse(row.event_data) as Record<string, unknown>),
    linked_at: row.linked_at,
    linked_by: row.linked_by,
    confidence_score: row.confidence_score ?? undefined,
    link_reason: row.link_reason ?? undefined,
  }
}

export function createCommitmentDatabase(paths: Pick<TrackerPaths, "dbFile">): CommitmentDatabase {
  const dbPath = paths.dbFile
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true })
  }

  const db = new Database(dbPath)

  db.pragma("journal_mode = WAL")
  db.pragma("synchronous = NORMAL")
  db.pragma("foreign_keys = ON")
  db.pragma("busy_timeout = 5000")

  db.exec(`
    CREATE TABLE IF NOT EXISTS commitments (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL CHECK (length(title) BETWEEN 1 AND 500),
      description TEXT,
      commitment_type TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'active' CHECK (status IN (${sqlList(COMMITMENT_STATUSES)})),
      start_date TEXT,
      end_date TEXT,
      timezone TEXT,
      date_certainty TEXT NOT NULL DEFAULT 'unknown' CHECK (date_certainty IN (${sqlList(DATE_CERTAINTIES)})),
      participants TEXT NOT NULL DEFAULT '[]',
      organizer TEXT,
      location TEXT,
      meeting_links TEXT NOT NULL DEFAULT '[]',
      auto_linked INTEGER NOT NULL DEFAULT 0,
      confidence_score REAL CHECK (confidence_score IS NULL OR confidence_score BETWEEN 0 AND 1),
      metadata TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      CHECK (start_date IS NULL OR end_date IS NULL OR end_date >= start_date)
    )
  `)

  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitments_dates ON commitments(start_date, end_date)`)
  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitments_type ON commitments(commitment_type)`)
  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitments_status ON commitments(status)`)
  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitments_certainty ON commitments(date_certainty)`)
  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitments_created_at ON commitments(created_at)`)

  db.exec(`
    CREATE TABLE IF NOT EXISTS commitment_emails (
      id TEXT PRIMARY KEY,
      commitment_id TEXT NOT NULL REFERENCES commitments(id) ON DELETE CASCADE,
      message_id TEXT NOT NULL,
      linked_at TEXT NOT NULL,
      linked_by TEXT NOT NULL DEFAULT 'ai' CHECK (linked_by IN (${sqlList(LINKED_BY_VALUES)})),
      confidence_score REAL CHECK (confidence_score IS NULL OR confidence_score BETWEEN 0 AND 1),
      link_reason TEXT,
      CONSTRAINT uq_commitment_email UNIQUE (commitment_id, message_id)
    )
  `)

  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitment_emails_commitment ON commitment_emails(commitment_id)`)
  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitment_emails_message ON commitment_emails(message_id)`)
  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitment_emails_linked_at ON commitment_emails(linked_at)`)
  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitment_emails_linked_by ON commitment_emails(linked_by)`)

  db.exec(`
    CREATE TABLE IF NOT EXISTS commitment_calendar_events (
      id TEXT PRIMARY KEY,
      commitment_id TEXT NOT NULL REFERENCES commitments(id) ON DELETE CASCADE,
      event_id TEXT NOT NULL,
      event_data TEXT,
      linked_at TEXT NOT NULL,
      linked_by TEXT NOT NULL DEFAULT 'ai' CHECK (linked_by IN (${sqlList(LINKED_BY_VALUES)})),
      confidence_score REAL CHECK (confidence_score IS NULL OR confidence_score BETWEEN 0 AND 1),
      link_reason TEXT,
      CONSTRAINT uq_commitment_calendar_event UNIQUE (commitment_id, event_id)
    )
  `)

  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitment_calendar_commitment ON commitment_calendar_events(commitment_id)`)
  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitment_calendar_event ON commitment_calendar_events(event_id)`)
  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitment_calendar_linked_at ON commitment_calendar_events(linked_at)`)
  db.exec(`CREATE INDEX IF NOT EXISTS idx_commitment_calendar_linked_by ON commitment_calendar_events(linked_by)`)

  const stmtInsertCommitment = db.prepare<CommitmentRow, void>(
    `INSERT INTO commitments (
       id, title, description, commitment_type, status, start_date, end_date, timezone, date_certainty,
       participants, organizer, location, meeting_links, auto_linked, confidence_score, metadata, created_at, updated_at
     ) VALUES (
       @id, @title, @description, @commitment_type, @status, @start_date, @end_date, @timezone, @date_certainty,
       @participants, @organizer, @location, @meeting_links, @auto_linked, @confidence_score, @metadata, @created_at, @updated_at
     )`,
  )

  const stmtUpdateCommitment = db.prepare<CommitmentRow, void>(
    `UPDATE commitments SET
       title = @title, description = @description, commitment_type = @commitment_type, status = @status,
       start_date = @start_date, end_date = @end_date, timezone = @timezone, date_certainty = @date_certainty,
       participants = @participants, organizer = @organizer, location = @location, meeting_links = @meeting_links,
       auto_linked = @auto_linked, confidence_score = @confidence_score, metadata = @metadata, updated_at = @updated_at
     WHERE id = @id`,
  )

  const stmtGetCommitment = db.prepare<[string], CommitmentRow>(
    `SELECT * FROM commitments WHERE id = ?`,
  )

  const stmtDeleteCommitment = db.prepare<[string], void>(
    `DELETE FROM commitments WHERE id = ?`,
  )

  const stmtAllCommitments = db.prepare<[], CommitmentRow>(
    `SELECT * FROM commitments ORDER BY created_at, id`,
  )

  const stmtCommitmentsByStatus = db.prepare<[string], CommitmentRow>(
    `SELECT * FROM commitments WHERE status = ? ORDER BY created_at, id`,
  )

  const stmtCommitmentsByType = db.prepare<[string], CommitmentRow>(
    `SELECT * FROM commitments WHERE commitment_type = ? ORDER BY created_at, id`,
  )

  // Overlap of [start_date, end_date ?? start_date] with [from, to]
  const stmtCommitmentsInRange = db.prepare<[string, string], CommitmentRow>(
    `SELECT * FROM commitments
     WHERE start_date IS NOT NULL AND start_date <= ? AND COALESCE(end_date, start_date) >= ?
     ORDER BY start_date, id`,
  )

  const stmtCommitmentsByParticipant = db.prepare<[string], CommitmentRow>(
    `SELECT c.* FROM commitments c
     WHERE EXISTS (
       SELECT 1 FROM json_each(c.participants) p
       WHERE lower(json_extract(p.value, '$.email')) = lower(?)
     )
     ORDER BY c.created_at, c.id`,
  )

  const stmtInsertEmailLink = db.prepare<EmailLinkRow, void>(
    `INSERT INTO commitment_emails (id, commitment_id, message_id, linked_at, linked_by, confidence_score, link_reason)
     VALUES (@id, @commitment_id, @message_id, @linked_at, @linked_by, @confidence_score, @link_reason)`,
  )

  const stmtInsertCalendarEventLink = db.prepare<CalendarEventLinkRow, void>(
    `INSERT INTO commitment_calendar_events
       (id, commitment_id, event_id, event_data, linked_at, linked_by, confidence_score, link_reason)
     VALUES (@id, @commitment_id, @event_id, @event_data, @linked_at, @linked_by, @confidence_score, @link_reason)`,
  )

  const stmtEmailLinks = db.prepare<[string], EmailLinkRow>(
    `SELECT * FROM commitment_emails WHERE commitment_id = ? ORDER BY linked_at, id`,
  )

  const stmtCalendarEventLinks = db.prepare<[string], CalendarEventLinkRow>(
    `SELECT * FROM commitment_calendar_events WHERE commitment_id = ? ORDER BY linked_at, id`,
  )

  const stmtCommitmentIdsByMessage = db.prepare<[string], CommitmentIdRow>(
    `SELECT commitment_id FROM commitment_emails WHERE message_id = ? ORDER BY linked_at, id`,
  )

  const stmtCommitmentIdsByEvent = db.prepare<[string], CommitmentIdRow>(
    `SELECT commitment_id FROM commitment_calendar_events WHERE event_id = ? ORDER BY linked_at, id`,
  )

  const stmtCountEmailLinks = db.prepare<[string], CountRow>(
    `SELECT COUNT(*) AS count FROM commitment_emails WHERE commitment_id = ?`,
  )

  const stmtCountCalendarEventLinks = db.prepare<[string], CountRow>(
    `SELECT COUNT(*) AS count FROM commitment_calendar_events WHERE commitment_id = ?`,
  )

  const stmtCountCommitments = db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM commitments`)
  const stmtCountAllEmailLinks = db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM commitment_emails`)
  const stmtCountAllCalendarEventLinks = db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM commitment_calendar_events`)

  return {
    get raw() {
      return db
    },

    close() {
      db.close()
    },

    transaction<T>(fn: () => T): T {
      return db.transaction(fn).immediate()
    },

    insertCommitment(record: Commitment) {
      stmtInsertCommitment.run(toCommitmentRow(record))
    },

    getCommitment(id: string): Commitment | undefined {
      const row = stmtGetCommitment.get(id)
      if (!row) return undefined
      return toCommitment(row)
    },

    saveCommitment(record: Commitment) {
      stmtUpdateCommitment.run(toCommitmentRow(record))
    },

    deleteCommitment(id: string): boolean {
      return stmtDeleteCommitment.run(id).changes > 0
    },

    listCommitments(): Commitment[] {
      return stmtAllCommitments.all().map(toCommitment)
    },

    listByStatus(status: CommitmentStatus): Commitment[] {
      return stmtCommitmentsByStatus.all(status).map(toCommitment)
    },

    listByType(type: string): Commitment[] {
      return stmtCommitmentsByType.all(type).map(toCommitment)
    },

    listInRange(from: string, to: string): Commitment[] {
      return stmtCommitmentsInRange.all(to, from).map(toCommitment)
    },

    findByParticipant(email: string): Commitment[] {
      return stmtCommitmentsByParticipant.all(email).map(toCommitment)
    },

    insertEmailLink(link: EmailLink) {
      stmtInsertEmailLink.run({
        id: link.id,
        commitment_id: link.commitment_id,
        message_id: link.message_id,
        linked_at: link.linked_at,
        linked_by: link.linked_by,
        confidence_score: link.confidence_score ?? null,
        link_reason: link.link_reason ?? null,
      })
    },

    insertCalendarEventLink(link: CalendarEventLink) {
      stmtInsertCalendarEventLink.run({
        id: link.id,
        commitment_id: link.commitment_id,
        event_id: link.event_id,
        event_data: link.event_data === undefined ? null : JSON.stringify(link.event_data),
        linked_at: link.linked_at,
        linked_by: link.linked_by,
        confidence_score: link.confidence_score ?? null,
        link_reason: link.link_reason ?? null,
      })
    },

    listEmailLinks(commitmentId: string): EmailLink[] {
      return stmtEmailLinks.all(commitmentId).map(toEmailLink)
    },

    listCalendarEventLinks(commitmentId: string): CalendarEventLink[] {
      return stmtCalendarEventLinks.all(commitmentId).map(toCalendarEventLink)
    },

    findCommitmentIdsByMessage(messageId: string): string[] {
      return stmtCommitmentIdsByMessage.all(messageId).map(row => row.commitment_id)
    },

    findCommitmentIdsByEvent(eventId: string): string[] {
      return stmtCommitmentIdsByEvent.all(eventId).map(row => row.commitment_id)
    },

    countLinks(commitmentId: string): LinkCounts {
      return {
        email_count: stmtCountEmailLinks.get(commitmentId)?.count ?? 0,
        calendar_event_count: stmtCountCalendarEventLinks.get(commitmentId)?.count ?? 0,
      }
    },

    getStats(): DatabaseStats {
      return {
        commitments: stmtCountCommitments.get()?.count ?? 0,
        emailLinks: stmtCountAllEmailLinks.get()?.count ?? 0,
        calendarEventLinks: stmtCountAllCalendarEventLinks.get()?.count ?? 0,
      }
    },
  }
}

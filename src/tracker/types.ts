export const DATE_CERTAINTIES = ["unknown", "month", "week", "day", "exact", "time_confirmed"] as const
export const COMMITMENT_STATUSES = ["active", "completed", "cancelled"] as const
export const LINKED_BY_VALUES = ["ai", "manual"] as const

export type DateCertainty = (typeof DATE_CERTAINTIES)[number]
export type CommitmentStatus = (typeof COMMITMENT_STATUSES)[number]
export type LinkedBy = (typeof LINKED_BY_VALUES)[number]

export interface Participant {
  email: string
  name?: string
  role?: string
}

export interface DateHistoryEntry {
  readonly date: string       // human-readable label, never parsed
  readonly source: string     // e.g. "email-123", "calendar-event-456"
  readonly updated_at: string // ISO 8601
}

export interface CommitmentMetadata {
  readonly date_history: readonly DateHistoryEntry[]
  attachments: string[]
  project?: string
  tags: string[]
}

export interface Commitment {
  id: string              // ULID
  title: string
  description?: string
  commitment_type: string // open label: meeting, event, project, trip, deadline, ...
  status: CommitmentStatus
  start_date?: string     // ISO 8601
  end_date?: string
  timezone?: string       // IANA label
  date_certainty: DateCertainty
  participants: Participant[]
  organizer?: string
  location?: string
  meeting_links: string[]
  auto_linked: boolean
  confidence_score?: number
  metadata: CommitmentMetadata
  created_at: string
  updated_at: string
}

interface LinkBase {
  id: string
  commitment_id: string
  linked_at: string
  linked_by: LinkedBy
  confidence_score?: number
  link_reason?: string
}

export interface EmailLink extends LinkBase {
  message_id: string
}

export interface CalendarEventLink extends LinkBase {
  event_id: string
  event_data?: Record<string, unknown>
}

export type LinkKind = "email" | "calendar_event"

export interface LinkCounts {
  email_count: number
  calendar_event_count: number
}

export interface SerializedCommitment extends LinkCounts {
  id: string
  title: string
  description: string | null
  commitment_type: string
  status: CommitmentStatus
  start_date: string | null
  end_date: string | null
  timezone: string | null
  date_certainty: DateCertainty
  participants: Participant[]
  organizer: string | null
  location: string | null
  meeting_links: string[]
  auto_linked: boolean
  confidence_score: number | null
  metadata: {
    date_history: DateHistoryEntry[]
    attachments: string[]
    project: string | null
    tags: string[]
  }
  created_at: string | null
  updated_at: string | null
}

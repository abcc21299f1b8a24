import { isValid, parseISO } from "date-fns"
import { fromZonedTime } from "date-fns-tz"
import { ulid } from "ulid"
import { z } from "zod"
import { parseCertainty } from "../certainty/lattice"
import { ValidationError } from "../errors"
import type { Commitment, CommitmentMetadata, LinkCounts, SerializedCommitment } from "../types"

const TimestampInputSchema = z.union([z.date(), z.string()])

const ParticipantSchema = z
  .object({
    email: z.string().trim().min(1),
    name: z.string().optional(),
    role: z.string().optional(),
  })
  .strict()

const MetadataInputSchema = z
  .object({
    attachments: z.array(z.string()).optional(),
    project: z.string().optional(),
    tags: z.array(z.string()).optional(),
  })
  .strict()

const DescriptiveFieldsSchema = z.object({
  description: z.string().optional(),
  timezone: z.string().optional(),
  participants: z.array(ParticipantSchema).optional(),
  organizer: z.string().max(500).optional(),
  location: z.string().optional(),
  meeting_links: z.array(z.string().url()).optional(),
  confidence_score: z.number().min(0).max(1).optional(),
  metadata: MetadataInputSchema.optional(),
})

export const CreateCommitmentInputSchema = DescriptiveFieldsSchema.extend({
  title: z.string().trim().min(1, "title is required").max(500),
  commitment_type: z.string().trim().min(1).max(100).default("meeting"),
  start_date: TimestampInputSchema.optional(),
  end_date: TimestampInputSchema.optional(),
  date_certainty: z.string().default("unknown"),
  auto_linked: z.boolean().default(false),
}).strict()

// Dates and certainty change only through refinement; auto_linked only through linking.
// null clears an optional field.
export const UpdateCommitmentInputSchema = DescriptiveFieldsSchema.extend({
  title: z.string().trim().min(1, "title is required").max(500).optional(),
  commitment_type: z.string().trim().min(1).max(100).optional(),
  description: z.string().nullable().optional(),
  timezone: z.string().nullable().optional(),
  organizer: z.string().max(500).nullable().optional(),
  location: z.string().nullable().optional(),
  confidence_score: z.number().min(0).max(1).nullable().optional(),
  metadata: MetadataInputSchema.extend({ project: z.string().nullable().optional() }).strict().optional(),
}).strict()

export type CreateCommitmentInput = z.input<typeof CreateCommitmentInputSchema>
export type UpdateCommitmentInput = z.input<typeof UpdateCommitmentInputSchema>
export type TimestampInput = z.input<typeof TimestampInputSchema>

export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input)
  if (result.success) return result.data
  const issue = result.error.issues[0]
  const field = issue.path.length > 0 ? issue.path.join(".") : undefined
  throw new ValidationError(field ? `${field}: ${issue.message}` : issue.message, field)
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/
const LOCAL_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?$/
const OFFSET_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/

function parseTimestamp(text: string, timezone: string | undefined): Date {
  if (DATE_ONLY.test(text)) return parseISO(`${text}T00:00:00Z`)
  if (LOCAL_DATE_TIME.test(text)) return fromZonedTime(text, timezone ?? "UTC")
  if (OFFSET_DATE_TIME.test(text)) return parseISO(text)
  return new Date(Number.NaN)
}

/**
 * Normalizes a timestamp to UTC ISO-8601. A date-time without an offset is
 * wall-clock time in `timezone`, or UTC when none is given; a bare date is
 * midnight UTC.
 */
export function toTimestamp(value: TimestampInput, field: string, timezone?: string): string {
  const date = value instanceof Date ? value : parseTimestamp(value.trim(), timezone)
  if (!isValid(date)) {
    throw new ValidationError(`${field}: invalid timestamp "${String(value)}"`, field)
  }
  return date.toISOString()
}

export function assertDateRange(start: string | undefined, end: string | undefined): void {
  if (start && end && Date.parse(end) < Date.parse(start)) {
    throw new ValidationError(`end_date ${end} precedes start_date ${start}`, "end_date")
  }
}

function assertTimeZone(timezone: string | undefined): void {
  if (timezone === undefined) return
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone })
  } catch {
    throw new ValidationError(`timezone: unknown IANA timezone "${timezone}"`, "timezone")
  }
}

/**
 * Builds a new active commitment. `created_at` and `updated_at` share one clock
 * reading so a fresh record always has them equal.
 */
export function createCommitmentRecord(input: CreateCommitmentInput, now: Date = new Date()): Commitment {
  const parsed = parseInput(CreateCommitmentInputSchema, input)
  const date_certainty = parseCertainty(parsed.date_certainty)
  assertTimeZone(parsed.timezone)
  const start_date = parsed.start_date === undefined ? undefined : toTimestamp(parsed.start_date, "start_date", parsed.timezone)
  const end_date = parsed.end_date === undefined ? undefined : toTimestamp(parsed.end_date, "end_date", parsed.timezone)
  assertDateRange(start_date, end_date)

  const timestamp = now.toISOString()
  return {
    id: ulid(now.getTime()),
    title: parsed.title,
    description: parsed.description,
    commitment_type: parsed.commitment_type,
    status: "active",
    start_date,
    end_date,
    timezone: parsed.timezone,
    date_certainty,
    participants: parsed.participants ?? [],
    organizer: parsed.organizer,
    location: parsed.location,
    meeting_links: parsed.meeting_links ?? [],
    auto_linked: parsed.auto_linked,
    confidence_score: parsed.confidence_score,
    metadata: {
      date_history: [],
      attachments: parsed.metadata?.attachments ?? [],
      project: parsed.metadata?.project,
      tags: parsed.metadata?.tags ?? [],
    },
    created_at: timestamp,
    updated_at: timestamp,
  }
}

function patchField<T>(value: T | null | undefined, current: T | undefined): T | undefined {
  if (value === null) return undefined
  return value ?? current
}

export function updateCommitmentRecord(record: Commitment, patch: UpdateCommitmentInput, now: Date = new Date()): Commitment {
  const parsed = parseInput(UpdateCommitmentInputSchema, patch)
  assertTimeZone(parsed.timezone ?? undefined)

  const metadata: CommitmentMetadata = {
    ...record.metadata,
    attachments: parsed.metadata?.attachments ?? record.metadata.attachments,
    project: patchField(parsed.metadata?.project, record.metadata.project),
    tags: parsed.metadata?.tags ?? record.metadata.tags,
  }

  return {
    ...record,
    title: parsed.title ?? record.title,
    description: patchField(parsed.description, record.description),
    commitment_type: parsed.commitment_type ?? record.commitment_type,
    timezone: patchField(parsed.timezone, record.timezone),
    participants: parsed.participants ?? record.participants,
    organizer: patchField(parsed.organizer, record.organizer),
    location: patchField(parsed.location, record.location),
    meeting_links: parsed.meeting_links ?? record.meeting_links,
    confidence_score: patchField(parsed.confidence_score, record.confidence_score),
    metadata,
    updated_at: now.toISOString(),
  }
}

/**
 * Appends one entry to `metadata.date_history`. `dateInfo` is a display label
 * and is stored as given.
 */
export function appendDateHistory(record: Commitment, dateInfo: string, source: string, now: Date = new Date()): Commitment {
  const updated_at = now.toISOString()
  return {
    ...record,
    metadata: {
      ...record.metadata,
      date_history: [...record.metadata.date_history, { date: dateInfo, source, updated_at }],
    },
    updated_at,
  }
}

export function serializeCommitment(record: Commitment, counts: LinkCounts): SerializedCommitment {
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
    participants: record.participants.map(p => ({ ...p })),
    organizer: record.organizer ?? null,
    location: record.location ?? null,
    meeting_links: [...record.meeting_links],
    auto_linked: record.auto_linked,
    confidence_score: record.confidence_score ?? null,
    metadata: {
      date_history: record.metadata.date_history.map(entry => ({ ...entry })),
      attachments: [...record.metadata.attachments],
      project: record.metadata.project ?? null,
      tags: [...record.metadata.tags],
    },
    created_at: record.created_at || null,
    updated_at: record.updated_at || null,
    email_count: counts.email_count,
    calendar_event_count: counts.calendar_event_count,
  }
}

import { z } from "zod"

export const ACTIVITY_EVENT_TYPES = [
  "commitment.created",
  "commitment.refined",
  "commitment.refinement_skipped",
  "commitment.updated",
  "commitment.status_changed",
  "commitment.deleted",
  "link.created",
  "link.duplicate",
] as const

export type ActivityEventType = (typeof ACTIVITY_EVENT_TYPES)[number]

export const ActivityEventSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  type: z.enum(ACTIVITY_EVENT_TYPES),
  commitment_id: z.string(),
  source: z.string().optional(),
  data: z.record(z.unknown()),
})

export type ActivityEvent = z.infer<typeof ActivityEventSchema>

export type ActivityEventInput = Omit<ActivityEvent, "id" | "timestamp">

export interface ActivityLoggerOptions {
  flushIntervalMs?: number
  flushThreshold?: number
  clock?: () => Date
}

export interface ActivityLogger {
  log(event: ActivityEventInput): Promise<ActivityEvent>
  flush(): Promise<void>
  getLogPath(date?: Date): string
  close(): Promise<void>
}

export interface ActivityReader {
  readDate(date: Date): Promise<ActivityEvent[]>
  readRange(from: Date, to: Date): Promise<ActivityEvent[]>
  queryByType(type: ActivityEventType, limit?: number): Promise<ActivityEvent[]>
  queryByCommitment(commitmentId: string, limit?: number): Promise<ActivityEvent[]>
  count(date?: Date): Promise<number>
}

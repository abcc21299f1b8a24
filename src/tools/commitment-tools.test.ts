import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"
import type { ActivityEvent, ActivityEventInput, ActivityLogger } from "../tracker/activity/types"
import { TrackerConfigSchema } from "../tracker/config"
import { createCommitmentService } from "../tracker/service"
import { createCommitmentDatabase } from "../tracker/store/db"
import type { CommitmentDatabase } from "../tracker/store/types"
import type { SerializedCommitment } from "../tracker/types"
import { createCommitmentTools } from "./commitment-tools"
import type { ToolDefinition } from "./types"

interface ToolResult {
  success: boolean
  error?: string
  code?: string
  already_linked?: boolean
  applied?: boolean
  commitment?: SerializedCommitment
  results?: SerializedCommitment[]
  total?: number
  status?: string
  email_count?: number
  calendar_event_count?: number
}

function parseJson<T>(value: string): T {
  return JSON.parse(value) as T
}

function createRecordingLogger(): ActivityLogger & { events: ActivityEvent[] } {
  const events: ActivityEvent[] = []
  return {
    events,
    async log(partial: ActivityEventInput): Promise<ActivityEvent> {
      const event: ActivityEvent = { ...partial, id: `evt-${events.length + 1}`, timestamp: "2025-11-20T09:00:00.000Z" }
      events.push(event)
      return event
    },
    async flush(): Promise<void> {},
    getLogPath(): string {
      return "activity.jsonl"
    },
    async close(): Promise<void> {},
  }
}

describe("tools/commitment-tools", () => {
  let db: CommitmentDatabase
  let activity: ReturnType<typeof createRecordingLogger>
  let tools: Record<string, ToolDefinition>

  async function run(name: string, args: unknown): Promise<ToolResult> {
    const definition = tools[name]
    if (!definition) throw new Error(`missing tool ${name}`)
    return parseJson<ToolResult>(await definition.execute(args))
  }

  async function createOffsite(): Promise<string> {
    const result = await run("commitment_create", {
      title: "Team Offsite",
      commitment_type: "trip",
      date_certainty: "month",
      start_date: "2025-12-01",
    })
    if (!result.commitment) throw new Error("create failed")
    return result.commitment.id
  }

  beforeEach(() => {
    db = createCommitmentDatabase({ dbFile: ":memory:" })
    activity = createRecordingLogger()
    tools = createCommitmentTools({
      service: createCommitmentService(db, { clock: () => new Date("2025-11-20T09:00:00.000Z") }),
      activityLogger: activity,
      config: TrackerConfigSchema.parse({}),
    })
  })

  afterEach(() => {
    db.close()
    vi.restoreAllMocks()
  })

  test("exposes every commitment tool", () => {
    expect(Object.keys(tools).sort()).toEqual([
      "commitment_create",
      "commitment_delete",
      "commitment_get",
      "commitment_link_calendar_event",
      "commitment_link_email",
      "commitment_list",
      "commitment_refine",
      "commitment_set_status",
      "commitment_update",
    ])
  })

  describe("commitment_create", () => {
    test("returns the serialized commitment and logs activity", async () => {
      // #when
      const result = await run("commitment_create", { title: "Team Offsite", commitment_type: "trip" })

      // #then
      expect(result.success).toBe(true)
      expect(result.commitment?.title).toBe("Team Offsite")
      expect(result.commitment?.start_date).toBeNull()
      expect(result.commitment?.email_count).toBe(0)
      expect(activity.events.map(e => e.type)).toEqual(["commitment.created"])
      expect(activity.events[0].source).toBe("tool")
    })

    test("returns VALIDATION_ERROR for an empty title", async () => {
      // #when
      const result = await run("commitment_create", { title: "   " })

      // #then
      expect(result).toEqual({ success: false, error: "title: title is required", code: "VALIDATION_ERROR" })
      expect(activity.events).toEqual([])
    })

    test("returns VALIDATION_ERROR for an unknown certainty", async () => {
      // #when
      const result = await run("commitment_create", { title: "Trip", date_certainty: "soonish" })

      // #then
      expect(result).toEqual({ success: false, error: 'Unknown date certainty: "soonish"', code: "VALIDATION_ERROR" })
    })
  })

  describe("commitment_refine", () => {
    test("overwrite mode applies a less certain observation", async () => {
      // #given
      const id = await createOffsite()
      await run("commitment_refine", { commitment_id: id, start: "2025-12-15T14:00:00Z", certainty: "exact", source: "email-2" })

      // #when
      const result = await run("commitment_refine", { commitment_id: id, start: "2025-12-01", certainty: "month", source: "email-3" })

      // #then
      expect(result.applied).toBe(true)
      expect(result.commitment?.date_certainty).toBe("month")
      expect(result.commitment?.metadata.date_history).toHaveLength(2)
    })

    test("monotonic mode records but skips a less certain observation", async () => {
      // #given
      const id = await createOffsite()
      await run("commitment_refine", { commitment_id: id, start: "2025-12-15", certainty: "day", source: "email-1" })

      // #when
      const result = await run("commitment_refine", {
        commitment_id: id,
        start: "2025-12-01",
        certainty: "month",
        source: "email-4",
        mode: "monotonic",
      })

      // #then
      expect(result.applied).toBe(false)
      expect(result.commitment?.start_date).toBe("2025-12-15T00:00:00.000Z")
      expect(result.commitment?.metadata.date_history).toHaveLength(2)
      expect(activity.events.map(e => e.type)).toEqual([
        "commitment.created",
        "commitment.refined",
        "commitment.refinement_skipped",
      ])
    })

    test("returns NOT_FOUND for an unknown commitment", async () => {
      // #when
      const result = await run("commitment_refine", { commitment_id: "missing", start: "2025-12-15", certainty: "day", source: "email-1" })

      // #then
      expect(result).toEqual({ success: false, error: "Commitment missing not found", code: "NOT_FOUND" })
    })
  })

  describe("commitment_link_email", () => {
    test("second link of the same message reports already_linked", async () => {
      // #given
      const id = await createOffsite()
      vi.spyOn(console, "debug").mockImplementation(() => {})

      // #when
      const first = await run("commitment_link_email", { commitment_id: id, message_id: "msg-1", confidence_score: 0.42 })
      const second = await run("commitment_link_email", { commitment_id: id, message_id: "msg-1", confidence_score: 0.42 })

      // #then
      expect(first.success).toBe(true)
      expect(second).toEqual({
        success: true,
        already_linked: true,
        commitment_id: id,
        kind: "email",
        source_id: "msg-1",
      })
      expect(db.countLinks(id)).toEqual({ email_count: 1, calendar_event_count: 0 })
      expect(activity.events.map(e => e.type)).toEqual(["commitment.created", "link.created", "link.duplicate"])
    })

    test("returns VALIDATION_ERROR for out-of-range confidence", async () => {
      // #given
      const id = await createOffsite()

      // #when
      const result = await run("commitment_link_email", { commitment_id: id, message_id: "msg-1", confidence_score: 1.5 })

      // #then
      expect(result.code).toBe("VALIDATION_ERROR")
      expect(db.countLinks(id).email_count).toBe(0)
    })

    test("uses the configured manual default when linked_by is omitted", async () => {
      // #given
      tools = createCommitmentTools({
        service: createCommitmentService(db),
        activityLogger: null,
        config: TrackerConfigSchema.parse({ links: { default_linked_by: "manual" } }),
      })
      const id = await createOffsite()

      // #when
      await run("commitment_link_email", { commitment_id: id, message_id: "msg-1" })

      // #then
      const result = await run("commitment_get", { commitment_id: id })
      expect(result.commitment?.auto_linked).toBe(false)
      expect(result.commitment?.email_count).toBe(1)
    })
  })

  describe("commitment_link_calendar_event", () => {
    test("get with include_links returns the event snapshot", async () => {
      // #given
      const id = await createOffsite()

      // #when
      await run("commitment_link_calendar_event", { commitment_id: id, event_id: "evt-1", event_data: { summary: "Offsite" } })
      const definition = tools.commitment_get
      const raw = await definition.execute({ commitment_id: id, include_links: true })
      const result = parseJson<{ calendar_event_links: Array<{ event_id: string; event_data: unknown }> }>(raw)

      // #then
      expect(result.calendar_event_links).toHaveLength(1)
      expect(result.calendar_event_links[0].event_id).toBe("evt-1")
      expect(result.calendar_event_links[0].event_data).toEqual({ summary: "Offsite" })
    })
  })

  describe("commitment_list", () => {
    test("filters by status and type", async () => {
      // #given
      const offsite = await createOffsite()
      await run("commitment_create", { title: "Board meeting" })
      await run("commitment_set_status", { commitment_id: offsite, status: "completed" })

      // #when
      const active = await run("commitment_list", { status: "active" })
      const trips = await run("commitment_list", { commitment_type: "trip" })

      // #then
      expect(active.results?.map(c => c.title)).toEqual(["Board meeting"])
      expect(trips.results?.map(c => c.title)).toEqual(["Team Offsite"])
    })

    test("returns VALIDATION_ERROR when only from is given", async () => {
      // #when
      const result = await run("commitment_list", { from: "2025-12-01" })

      // #then
      expect(result).toEqual({ success: false, error: "from: from and to must be given together", code: "VALIDATION_ERROR" })
    })

    test("limit caps results but not total", async () => {
      // #given
      await run("commitment_create", { title: "One" })
      await run("commitment_create", { title: "Two" })

      // #when
      const result = await run("commitment_list", { limit: 1 })

      // #then
      expect(result.total).toBe(2)
      expect(result.results).toHaveLength(1)
    })
  })

  describe("commitment_set_status", () => {
    test("returns VALIDATION_ERROR when a completed commitment is cancelled", async () => {
      // #given
      const id = await createOffsite()

      // #when
      const done = await run("commitment_set_status", { commitment_id: id, status: "completed" })
      const again = await run("commitment_set_status", { commitment_id: id, status: "cancelled" })

      // #then
      expect(done).toEqual({ success: true, commitment_id: id, status: "completed" })
      expect(again.code).toBe("VALIDATION_ERROR")
    })
  })

  describe("commitment_update", () => {
    test("updates descriptive fields and records which changed", async () => {
      // #given
      const id = await createOffsite()

      // #when
      const result = await run("commitment_update", { commitment_id: id, patch: { location: "Lake house" } })

      // #then
      expect(result.commitment?.location).toBe("Lake house")
      expect(activity.events[1]).toMatchObject({ type: "commitment.updated", data: { fields: ["location"] } })
    })

    test("null in the patch clears a field", async () => {
      // #given
      const id = await createOffsite()
      await run("commitment_update", { commitment_id: id, patch: { location: "Lake house" } })

      // #when
      const result = await run("commitment_update", { commitment_id: id, patch: { location: null } })

      // #then
      expect(result.commitment?.location).toBeNull()
      expect(activity.events[2]).toMatchObject({ type: "commitment.updated", data: { fields: ["location"] } })
    })

    test("returns VALIDATION_ERROR for a date field in the patch", async () => {
      // #given
      const id = await createOffsite()

      // #when
      const result = await run("commitment_update", { commitment_id: id, patch: { start_date: "2025-12-20" } })

      // #then
      expect(result.code).toBe("VALIDATION_ERROR")
    })
  })

  describe("commitment_delete", () => {
    test("removes the commitment and reports removed links", async () => {
      // #given
      const id = await createOffsite()
      await run("commitment_link_email", { commitment_id: id, message_id: "msg-1" })

      // #when
      const result = await run("commitment_delete", { commitment_id: id })
      const after = await run("commitment_get", { commitment_id: id })

      // #then
      expect(result).toEqual({ success: true, commitment_id: id, email_count: 1, calendar_event_count: 0 })
      expect(after.code).toBe("NOT_FOUND")
    })
  })
})

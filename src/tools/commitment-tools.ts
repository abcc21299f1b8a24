import { z } from "zod"
import { logDebug } from "../shared/logger"
import type { ActivityEventInput } from "../tracker/activity/types"
import { REFINEMENT_MODES } from "../tracker/config"
import { DuplicateLinkError } from "../tracker/errors"
import { CreateCommitmentInputSchema, UpdateCommitmentInputSchema } from "../tracker/records/commitment"
import type { Commitment } from "../tracker/types"
import { COMMITMENT_STATUSES, LINKED_BY_VALUES } from "../tracker/types"
import {
  COMMITMENT_CREATE_DESCRIPTION,
  COMMITMENT_DELETE_DESCRIPTION,
  COMMITMENT_GET_DESCRIPTION,
  COMMITMENT_LINK_CALENDAR_EVENT_DESCRIPTION,
  COMMITMENT_LINK_EMAIL_DESCRIPTION,
  COMMITMENT_LIST_DESCRIPTION,
  COMMITMENT_REFINE_DESCRIPTION,
  COMMITMENT_SET_STATUS_DESCRIPTION,
  COMMITMENT_UPDATE_DESCRIPTION,
  DEFAULT_LIST_LIMIT,
  TERMINAL_STATUSES,
} from "./constants"
import { defineTool } from "./tool"
import type { CommitmentToolDeps, ToolDefinition } from "./types"

const CommitmentIdSchema = z.string().trim().min(1)
const DateValueSchema = z.string().trim().min(1)

const ProvenanceArgs = {
  linked_by: z.enum(LINKED_BY_VALUES).optional().describe("Defaults to the configured links.default_linked_by"),
  confidence_score: z.number().optional().describe("Linker confidence in [0, 1]"),
  link_reason: z.string().optional(),
}

export function createCommitmentTools(deps: CommitmentToolDeps): Record<string, ToolDefinition> {
  const { service } = deps

  async function record(event: ActivityEventInput): Promise<void> {
    if (deps.activityLogger) {
      await deps.activityLogger.log({ source: "tool", ...event })
    }
  }

  async function alreadyLinked(error: DuplicateLinkError): Promise<string> {
    logDebug("Link already present", { commitment_id: error.commitmentId, kind: error.kind, source_id: error.sourceId })
    await record({
      type: "link.duplicate",
      commitment_id: error.commitmentId,
      data: { kind: error.kind, source_id: error.sourceId },
    })
    return JSON.stringify({
      success: true,
      already_linked: true,
      commitment_id: error.commitmentId,
      kind: error.kind,
      source_id: error.sourceId,
    })
  }

  function matchesParticipant(commitment: Commitment, email: string): boolean {
    const needle = email.toLowerCase()
    return commitment.participants.some(p => p.email.toLowerCase() === needle)
  }

  const commitment_create = defineTool({
    description: COMMITMENT_CREATE_DESCRIPTION,
    args: CreateCommitmentInputSchema,
    execute: async (args) => {
      const commitment = service.createCommitment(args)
      await record({
        type: "commitment.created",
        commitment_id: commitment.id,
        data: { title: commitment.title, commitment_type: commitment.commitment_type, date_certainty: commitment.date_certainty },
      })
      return JSON.stringify({ success: true, commitment: service.serialize(commitment.id) })
    },
  })

  const commitment_refine = defineTool({
    description: COMMITMENT_REFINE_DESCRIPTION,
    args: z
      .object({
        commitment_id: CommitmentIdSchema,
        start: DateValueSchema.describe("ISO 8601 date or timestamp"),
        end: DateValueSchema.optional(),
        certainty: z.string().describe("unknown | month | week | day | exact | time_confirmed"),
        source: z.string().trim().min(1).describe("Where the observation came from, e.g. email-123"),
        mode: z.enum(REFINEMENT_MODES).optional(),
      })
      .strict(),
    execute: async (args) => {
      const observation = { start: args.start, end: args.end, certainty: args.certainty, source: args.source }
      const mode = args.mode ?? deps.config.refinement.default_mode

      let applied = true
      if (mode === "monotonic") {
        applied = service.refineGated(args.commitment_id, observation).applied
      } else {
        service.refine(args.commitment_id, observation)
      }

      await record({
        type: applied ? "commitment.refined" : "commitment.refinement_skipped",
        commitment_id: args.commitment_id,
        data: { source: args.source, certainty: args.certainty, mode },
      })
      return JSON.stringify({ success: true, applied, commitment: service.serialize(args.commitment_id) })
    },
  })

  const commitment_link_email = defineTool({
    description: COMMITMENT_LINK_EMAIL_DESCRIPTION,
    args: z.object({ commitment_id: CommitmentIdSchema, message_id: z.string(), ...ProvenanceArgs }).strict(),
    execute: async (args) => {
      try {
        const link = service.linkEmail(args.commitment_id, args.message_id, {
          linked_by: args.linked_by ?? deps.config.links.default_linked_by,
          confidence_score: args.confidence_score,
          link_reason: args.link_reason,
        })
        await record({
          type: "link.created",
          commitment_id: link.commitment_id,
          data: { kind: "email", message_id: link.message_id, linked_by: link.linked_by },
        })
        return JSON.stringify({ success: true, link })
      } catch (error) {
        if (error instanceof DuplicateLinkError) return alreadyLinked(error)
        throw error
      }
    },
  })

  const commitment_link_calendar_event = defineTool({
    description: COMMITMENT_LINK_CALENDAR_EVENT_DESCRIPTION,
    args: z
      .object({
        commitment_id: CommitmentIdSchema,
        event_id: z.string(),
        event_data: z.record(z.unknown()).optional().describe("Snapshot of the calendar event"),
        ...ProvenanceArgs,
      })
      .strict(),
    execute: async (args) => {
      try {
        const link = service.linkCalendarEvent(args.commitment_id, args.event_id, {
          event_data: args.event_data,
          linked_by: args.linked_by ?? deps.config.links.default_linked_by,
          confidence_score: args.confidence_score,
          link_reason: args.link_reason,
        })
        await record({
          type: "link.created",
          commitment_id: link.commitment_id,
          data: { kind: "calendar_event", event_id: link.event_id, linked_by: link.linked_by },
        })
        return JSON.stringify({ success: true, link })
      } catch (error) {
        if (error instanceof DuplicateLinkError) return alreadyLinked(error)
        throw error
      }
    },
  })

  const commitment_get = defineTool({
    description: COMMITMENT_GET_DESCRIPTION,
    args: z.object({ commitment_id: CommitmentIdSchema, include_links: z.boolean().default(false) }).strict(),
    execute: async (args) => {
      const commitment = service.serialize(args.commitment_id)
      if (!args.include_links) return JSON.stringify({ success: true, commitment })
      return JSON.stringify({
        success: true,
        commitment,
        email_links: service.listEmailLinks(args.commitment_id),
        calendar_event_links: service.listCalendarEventLinks(args.commitment_id),
      })
    },
  })

  const commitment_list = defineTool({
    description: COMMITMENT_LIST_DESCRIPTION,
    args: z
      .object({
        status: z.enum(COMMITMENT_STATUSES).optional(),
        commitment_type: z.string().optional(),
        participant: z.string().trim().min(1).optional().describe("Participant email"),
        from: DateValueSchema.optional(),
        to: DateValueSchema.optional(),
        limit: z.number().int().min(1).max(500).default(DEFAULT_LIST_LIMIT),
      })
      .strict()
      .refine(args => (args.from === undefined) === (args.to === undefined), {
        message: "from and to must be given together",
        path: ["from"],
      }),
    execute: async (args) => {
      let commitments: Commitment[]
      if (args.from !== undefined && args.to !== undefined) {
        commitments = service.listInRange(args.from, args.to)
      } else if (args.participant) {
        commitments = service.findByParticipant(args.participant)
      } else if (args.status) {
        commitments = service.listByStatus(args.status)
      } else {
        commitments = service.list()
      }

      const { status, commitment_type, participant } = args
      if (status) commitments = commitments.filter(c => c.status === status)
      if (commitment_type) commitments = commitments.filter(c => c.commitment_type === commitment_type)
      if (participant) commitments = commitments.filter(c => matchesParticipant(c, participant))

      const results = commitments.slice(0, args.limit).map(c => service.serialize(c.id))
      return JSON.stringify({ success: true, total: commitments.length, results })
    },
  })

  const commitment_update = defineTool({
    description: COMMITMENT_UPDATE_DESCRIPTION,
    args: z.object({ commitment_id: CommitmentIdSchema, patch: UpdateCommitmentInputSchema }).strict(),
    execute: async (args) => {
      const updated = service.update(args.commitment_id, args.patch)
      await record({
        type: "commitment.updated",
        commitment_id: updated.id,
        data: { fields: Object.keys(args.patch) },
      })
      return JSON.stringify({ success: true, commitment: service.serialize(updated.id) })
    },
  })

  const commitment_set_status = defineTool({
    description: COMMITMENT_SET_STATUS_DESCRIPTION,
    args: z.object({ commitment_id: CommitmentIdSchema, status: z.enum(TERMINAL_STATUSES) }).strict(),
    execute: async (args) => {
      const updated = args.status === "completed" ? service.complete(args.commitment_id) : service.cancel(args.commitment_id)
      await record({
        type: "commitment.status_changed",
        commitment_id: updated.id,
        data: { status: updated.status },
      })
      return JSON.stringify({ success: true, commitment_id: updated.id, status: updated.status })
    },
  })

  const commitment_delete = defineTool({
    description: COMMITMENT_DELETE_DESCRIPTION,
    args: z.object({ commitment_id: CommitmentIdSchema }).strict(),
    execute: async (args) => {
      const deleted = service.delete(args.commitment_id)
      await record({
        type: "commitment.deleted",
        commitment_id: deleted.commitment_id,
        data: { email_count: deleted.email_count, calendar_event_count: deleted.calendar_event_count },
      })
      return JSON.stringify({ success: true, ...deleted })
    },
  })

  return {
    commitment_create,
    commitment_refine,
    commitment_link_email,
    commitment_link_calendar_event,
    commitment_get,
    commitment_list,
    commitment_update,
    commitment_set_status,
    commitment_delete,
  }
}

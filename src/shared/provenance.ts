import { ValidationError } from "../tracker/errors"
import type { LinkedBy } from "../tracker/types"

export interface CreateLinkProvenanceOptions {
  linked_by?: LinkedBy
  confidence_score?: number
  link_reason?: string
}

export interface LinkProvenance {
  linked_at: string
  linked_by: LinkedBy
  confidence_score?: number
  link_reason?: string
}

export function createLinkProvenance(options: CreateLinkProvenanceOptions, now: Date = new Date()): LinkProvenance {
  const confidence = options.confidence_score
  if (confidence !== undefined && !(confidence >= 0 && confidence <= 1)) {
    throw new ValidationError(`confidence_score must be between 0 and 1, got ${confidence}`, "confidence_score")
  }

  const reason = options.link_reason?.trim()
  return {
    linked_at: now.toISOString(),
    linked_by: options.linked_by ?? "ai",
    confidence_score: confidence,
    link_reason: reason ? reason : undefined,
  }
}

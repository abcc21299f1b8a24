import type { LinkKind } from "./types"

export type CommitmentErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "DUPLICATE_LINK"

export class CommitmentError extends Error {
  readonly code: CommitmentErrorCode

  constructor(code: CommitmentErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

export class ValidationError extends CommitmentError {
  readonly field?: string

  constructor(message: string, field?: string) {
    super("VALIDATION_ERROR", message)
    this.field = field
  }
}

export class InvalidCertaintyError extends ValidationError {
  readonly label: string

  constructor(label: string) {
    super(`Unknown date certainty: "${label}"`, "date_certainty")
    this.label = label
  }
}

export class NotFoundError extends CommitmentError {
  readonly commitmentId: string

  constructor(commitmentId: string) {
    super("NOT_FOUND", `Commitment ${commitmentId} not found`)
    this.commitmentId = commitmentId
  }
}

export class DuplicateLinkError extends CommitmentError {
  readonly kind: LinkKind
  readonly commitmentId: string
  readonly sourceId: string

  constructor(kind: LinkKind, commitmentId: string, sourceId: string) {
    super("DUPLICATE_LINK", `Commitment ${commitmentId} is already linked to ${kind} ${sourceId}`)
    this.kind = kind
    this.commitmentId = commitmentId
    this.sourceId = sourceId
  }
}

export function isCommitmentError(error: unknown): error is CommitmentError {
  return error instanceof CommitmentError
}

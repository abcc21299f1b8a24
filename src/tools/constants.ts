export const COMMITMENT_CREATE_DESCRIPTION =
  "Create a commitment (meeting, trip, deadline, ...) from what is currently known. Dates may be vague: set date_certainty to how precise start_date is."

export const COMMITMENT_REFINE_DESCRIPTION =
  "Record a new date observation for a commitment, citing the email or calendar event it came from. Mode 'overwrite' always applies it; 'monotonic' applies it only when it is at least as certain as the stored date. Every observation is kept in the date history."

export const COMMITMENT_LINK_EMAIL_DESCRIPTION =
  "Link an email message to a commitment with provenance (who linked it, confidence, reason). Linking the same message twice reports already_linked."

export const COMMITMENT_LINK_CALENDAR_EVENT_DESCRIPTION =
  "Link a calendar event to a commitment, storing a snapshot of the event. Linking the same event twice reports already_linked."

export const COMMITMENT_GET_DESCRIPTION =
  "Get one commitment with its date history and link counts. Set include_links to also return the linked emails and calendar events."

export const COMMITMENT_LIST_DESCRIPTION =
  "List commitments, filtered by status, type, participant email, or a date window (from and to together)."

export const COMMITMENT_UPDATE_DESCRIPTION =
  "Update descriptive fields of a commitment (title, location, participants, ...). Dates change only through commitment_refine."

export const COMMITMENT_SET_STATUS_DESCRIPTION =
  "Mark an active commitment completed or cancelled. Terminal commitments cannot change status again."

export const COMMITMENT_DELETE_DESCRIPTION =
  "Delete a commitment together with all of its email and calendar-event links."

export const TERMINAL_STATUSES = ["completed", "cancelled"] as const

export const DEFAULT_LIST_LIMIT = 50

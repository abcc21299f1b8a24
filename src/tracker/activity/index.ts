export { createActivityLogger } from "./logger"
export { createActivityReader } from "./reader"
export { ACTIVITY_EVENT_TYPES } from "./types"
export type { ActivityEvent, ActivityEventInput, ActivityEventType, ActivityLogger, ActivityLoggerOptions, ActivityReader } from "./types"

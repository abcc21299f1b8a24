export * from "./types"
export * from "./errors"
export { TrackerConfigSchema, REFINEMENT_MODES, type TrackerConfig, type TrackerConfigInput, type RefinementMode } from "./config"
export { compareCertainty, isDateCertainty, isRefinement, parseCertainty, rank } from "./certainty/lattice"
export {
  appendDateHistory,
  createCommitmentRecord,
  serializeCommitment,
  updateCommitmentRecord,
  type CreateCommitmentInput,
  type TimestampInput,
  type UpdateCommitmentInput,
} from "./records/commitment"
export { formatDateInfo, refine, refineIfMoreCertain, type DateObservation, type GatedRefinement } from "./refinement/refine"
export { createLinkRegistry, type LinkCalendarEventOptions, type LinkEmailOptions, type LinkRegistry } from "./links/link-registry"
export { createCommitmentDatabase } from "./store/db"
export { createTrackerPaths, type TrackerPaths } from "./store/paths"
export type { CommitmentDatabase, DatabaseStats } from "./store/types"
export { createCommitmentService, type CommitmentService, type CommitmentServiceOptions, type DeletedCommitment } from "./service"
export * from "./activity"

import { createCommitmentTools } from "../tools/commitment-tools"
import type { ToolDefinition } from "../tools/types"
import { createActivityLogger } from "./activity/logger"
import { createActivityReader } from "./activity/reader"
import type { ActivityLogger, ActivityReader } from "./activity/types"
import type { TrackerConfig } from "./config"
import { createCommitmentService, type CommitmentService } from "./service"
import { createCommitmentDatabase } from "./store/db"
import { createTrackerPaths, type TrackerPaths } from "./store/paths"
import type { CommitmentDatabase } from "./store/types"

export interface CommitmentTracker {
  readonly paths: TrackerPaths
  readonly config: TrackerConfig
  readonly db: CommitmentDatabase
  readonly service: CommitmentService
  readonly activityLogger: ActivityLogger | null
  readonly activityReader: ActivityReader
  readonly tools: Record<string, ToolDefinition>
  close(): Promise<void>
}

export function createCommitmentTracker(
  config: TrackerConfig,
  directory: string,
  options: { clock?: () => Date } = {},
): CommitmentTracker {
  const paths = createTrackerPaths(directory, config.data_dir, config.db_file)
  const db = createCommitmentDatabase(paths)
  const service = createCommitmentService(db, { clock: options.clock })
  const activityLogger = config.activity.enabled
    ? createActivityLogger(paths, {
        flushIntervalMs: config.activity.flush_interval_ms,
        flushThreshold: config.activity.flush_threshold,
        clock: options.clock,
      })
    : null
  const activityReader = createActivityReader(paths)
  const tools = createCommitmentTools({ service, activityLogger, config })
  let closed = false

  return {
    paths,
    config,
    db,
    service,
    activityLogger,
    activityReader,
    tools,

    async close(): Promise<void> {
      if (closed) return
      closed = true
      try {
        if (activityLogger) await activityLogger.close()
      } finally {
        db.close()
      }
    },
  }
}

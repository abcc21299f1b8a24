import type { z } from "zod"
import type { ActivityLogger } from "../tracker/activity/types"
import type { TrackerConfig } from "../tracker/config"
import type { CommitmentService } from "../tracker/service"

export interface CommitmentToolDeps {
  service: CommitmentService
  activityLogger: ActivityLogger | null
  config: Pick<TrackerConfig, "refinement" | "links">
}

export interface ToolDefinition {
  description: string
  args: z.ZodTypeAny
  /** Validates the raw arguments and resolves to a JSON string. */
  execute(args: unknown): Promise<string>
}

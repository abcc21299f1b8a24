import { log } from "./shared/logger"
import { createCommitmentTracker, type CommitmentTracker } from "./tracker"
import { loadTrackerConfig } from "./tracker-config"

export * from "./tracker"
export { createCommitmentTools, defineTool, type CommitmentToolDeps, type ToolDefinition } from "./tools"
export { loadTrackerConfig, getGlobalConfigPath, getProjectConfigPath } from "./tracker-config"
export { createLinkProvenance, type CreateLinkProvenanceOptions, type LinkProvenance } from "./shared/provenance"
export { setLogLevel, getLogLevel, type LogLevel } from "./shared/logger"

/**
 * Loads layered configuration for `directory` and opens the tracker there.
 * Resolves to null when the configuration disables it.
 */
export async function openCommitmentTracker(
  directory: string,
  inline: unknown = {},
  options: { home?: string; clock?: () => Date } = {},
): Promise<CommitmentTracker | null> {
  const config = await loadTrackerConfig(directory, inline, { home: options.home })
  if (!config.enabled) {
    log("Commitment tracker disabled by config", { directory })
    return null
  }

  const tracker = createCommitmentTracker(config, directory, { clock: options.clock })
  log("Commitment tracker opened", { db: tracker.paths.dbFile, activity: config.activity.enabled })
  return tracker
}

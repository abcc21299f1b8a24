export { createCommitmentTools } from "./commitment-tools"
export { defineTool, toolFailure } from "./tool"
export type { CommitmentToolDeps, ToolDefinition } from "./types"

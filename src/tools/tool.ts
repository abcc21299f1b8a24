import type { z } from "zod"
import { isCommitmentError } from "../tracker/errors"
import { parseInput } from "../tracker/records/commitment"
import type { ToolDefinition } from "./types"

interface ToolOptions<S extends z.ZodTypeAny> {
  description: string
  args: S
  execute: (args: z.output<S>) => Promise<string>
}

export function toolFailure(error: unknown): string {
  if (isCommitmentError(error)) {
    return JSON.stringify({ success: false, error: error.message, code: error.code })
  }
  throw error
}

export function defineTool<S extends z.ZodTypeAny>(options: ToolOptions<S>): ToolDefinition {
  return {
    description: options.description,
    args: options.args,
    execute: async (raw: unknown): Promise<string> => {
      try {
        return await options.execute(parseInput(options.args, raw))
      } catch (error) {
        return toolFailure(error)
      }
    },
  }
}

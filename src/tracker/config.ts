import { z } from "zod"
import { LINKED_BY_VALUES } from "./types"

export const REFINEMENT_MODES = ["overwrite", "monotonic"] as const

export type RefinementMode = (typeof REFINEMENT_MODES)[number]

export const TrackerActivityConfigSchema = z.object({
  enabled: z.boolean().default(true),
  flush_interval_ms: z.number().int().min(100).max(60_000).default(5_000),
  flush_threshold: z.number().int().min(1).max(1_000).default(10),
})

export const TrackerRefinementConfigSchema = z.object({
  default_mode: z.enum(REFINEMENT_MODES).default("overwrite").describe("monotonic skips less certain observations"),
})

export const TrackerLinksConfigSchema = z.object({
  default_linked_by: z.enum(LINKED_BY_VALUES).default("ai"),
})

export const TrackerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  data_dir: z.string().min(1).default(".commitments").describe("Relative to the project directory"),
  db_file: z.string().min(1).default("commitments.sqlite"),
  activity: TrackerActivityConfigSchema.default({}),
  refinement: TrackerRefinementConfigSchema.default({}),
  links: TrackerLinksConfigSchema.default({}),
})

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>
export type TrackerConfigInput = z.input<typeof TrackerConfigSchema>
export type TrackerActivityConfig = z.infer<typeof TrackerActivityConfigSchema>
export type TrackerRefinementConfig = z.infer<typeof TrackerRefinementConfigSchema>
export type TrackerLinksConfig = z.infer<typeof TrackerLinksConfigSchema>

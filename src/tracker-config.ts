import { readFile } from "node:fs/promises"
import { homedir } from "node:os"
import { join } from "node:path"
import { logWarn } from "./shared/logger"
import { TrackerConfigSchema, type TrackerConfig } from "./tracker/config"

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

async function readJsonFile(filePath: string): Promise<Record<string, unknown>> {
  let raw: string
  try {
    raw = await readFile(filePath, "utf-8")
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") return {}
    throw error
  }
  try {
    const parsed: unknown = JSON.parse(raw)
    return isRecord(parsed) ? parsed : {}
  } catch {
    logWarn("Ignoring unreadable config file", { path: filePath })
    return {}
  }
}

// Nested sections merge key by key so a project file can override one setting.
function mergeLayers(...layers: Record<string, unknown>[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {}
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      const existing = merged[key]
      merged[key] = isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value
    }
  }
  return merged
}

export function getGlobalConfigPath(home: string = homedir()): string {
  return join(home, ".config", "commitment-tracker", "config.json")
}

export function getProjectConfigPath(directory: string): string {
  return join(directory, ".commitment-tracker.json")
}

export async function loadTrackerConfig(
  directory: string,
  inline: unknown = {},
  options: { home?: string } = {},
): Promise<TrackerConfig> {
  const globalConfig = await readJsonFile(getGlobalConfigPath(options.home))
  const projectConfig = await readJsonFile(getProjectConfigPath(directory))
  const inlineConfig = isRecord(inline) ? inline : {}

  return TrackerConfigSchema.parse(mergeLayers(globalConfig, projectConfig, inlineConfig))
}

import { readdir, readFile } from "node:fs/promises"
import { basename, join } from "node:path"
import { logWarn } from "../../shared/logger"
import type { TrackerPaths } from "../store/paths"
import { formatDay } from "./logger"
import { ActivityEventSchema, type ActivityEvent, type ActivityEventType, type ActivityReader } from "./types"

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

function parseDayFromFilename(filename: string): string | null {
  const match = basename(filename).match(/^(\d{4}-\d{2}-\d{2})\.jsonl$/)
  return match ? match[1] : null
}

async function readJsonlFile(filePath: string): Promise<ActivityEvent[]> {
  let content: string
  try {
    content = await readFile(filePath, "utf-8")
  } catch (error) {
    if (isMissingFile(error)) return []
    throw error
  }

  const events: ActivityEvent[] = []
  for (const line of content.split("\n")) {
    if (line.trim().length === 0) continue
    let raw: unknown
    try {
      raw = JSON.parse(line)
    } catch {
      logWarn("Skipping unreadable activity line", { file: basename(filePath) })
      continue
    }
    const parsed = ActivityEventSchema.safeParse(raw)
    if (parsed.success) {
      events.push(parsed.data)
    } else {
      logWarn("Skipping malformed activity event", { file: basename(filePath) })
    }
  }
  return events
}

export function createActivityReader(paths: Pick<TrackerPaths, "activityDaily">): ActivityReader {
  async function listDayFiles(): Promise<string[]> {
    try {
      const files = await readdir(paths.activityDaily)
      return files.filter(file => parseDayFromFilename(file) !== null).sort()
    } catch (error) {
      if (isMissingFile(error)) return []
      throw error
    }
  }

  // Newest first, across day files
  async function queryLatest(matches: (event: ActivityEvent) => boolean, limit: number): Promise<ActivityEvent[]> {
    const results: ActivityEvent[] = []
    for (const file of (await listDayFiles()).reverse()) {
      if (results.length >= limit) break
      const events = await readJsonlFile(join(paths.activityDaily, file))
      for (const event of events.reverse()) {
        if (!matches(event)) continue
        results.push(event)
        if (results.length >= limit) break
      }
    }
    return results
  }

  return {
    async readDate(date: Date): Promise<ActivityEvent[]> {
      return readJsonlFile(join(paths.activityDaily, `${formatDay(date)}.jsonl`))
    },

    async readRange(from: Date, to: Date): Promise<ActivityEvent[]> {
      const first = formatDay(from)
      const last = formatDay(to)
      const events: ActivityEvent[] = []
      for (const file of await listDayFiles()) {
        const day = parseDayFromFilename(file)
        if (!day || day < first || day > last) continue
        events.push(...(await readJsonlFile(join(paths.activityDaily, file))))
      }
      return events
    },

    async queryByType(type: ActivityEventType, limit = 50): Promise<ActivityEvent[]> {
      return queryLatest(event => event.type === type, limit)
    },

    async queryByCommitment(commitmentId: string, limit = 50): Promise<ActivityEvent[]> {
      return queryLatest(event => event.commitment_id === commitmentId, limit)
    },

    async count(date?: Date): Promise<number> {
      if (date) {
        const events = await this.readDate(date)
        return events.length
      }
      let total = 0
      for (const file of await listDayFiles()) {
        total += (await readJsonlFile(join(paths.activityDaily, file))).length
      }
      return total
    },
  }
}

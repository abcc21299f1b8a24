import { appendFile, mkdir } from "node:fs/promises"
import { join } from "node:path"
import { ulid } from "ulid"
import { logError } from "../../shared/logger"
import type { TrackerPaths } from "../store/paths"
import type { ActivityEvent, ActivityLogger, ActivityLoggerOptions } from "./types"

export function formatDay(date: Date): string {
  return date.toISOString().split("T")[0] // YYYY-MM-DD
}

export function createActivityLogger(
  paths: Pick<TrackerPaths, "activityDaily">,
  options: ActivityLoggerOptions = {},
): ActivityLogger {
  const flushIntervalMs = options.flushIntervalMs ?? 5_000
  const flushThreshold = options.flushThreshold ?? 10
  const clock = options.clock ?? (() => new Date())
  const buffer: ActivityEvent[] = []
  let flushTimer: ReturnType<typeof setTimeout> | null = null

  function getLogPathForDate(date: Date): string {
    return join(paths.activityDaily, `${formatDay(date)}.jsonl`)
  }

  async function flushBuffer(): Promise<void> {
    if (buffer.length === 0) return

    // Events logged around midnight go to their own day's file
    const byDay = new Map<string, ActivityEvent[]>()
    for (const event of buffer.splice(0)) {
      const day = formatDay(new Date(event.timestamp))
      const events = byDay.get(day) ?? []
      events.push(event)
      byDay.set(day, events)
    }

    const pending = [...byDay.entries()]
    try {
      await mkdir(paths.activityDaily, { recursive: true })
      while (pending.length > 0) {
        const [day, events] = pending[0]
        const lines = events.map(event => JSON.stringify(event))
        await appendFile(join(paths.activityDaily, `${day}.jsonl`), lines.join("\n") + "\n", "utf-8")
        pending.shift()
      }
    } catch (error) {
      // Unwritten events go back to the front of the buffer for the next flush
      buffer.unshift(...pending.flatMap(([, events]) => events))
      throw error
    }
  }

  function cancelTimer(): void {
    if (!flushTimer) return
    clearTimeout(flushTimer)
    flushTimer = null
  }

  function scheduleFlush(): void {
    if (flushTimer) return
    flushTimer = setTimeout(() => {
      flushTimer = null
      flushBuffer().catch(error => {
        logError("Activity flush failed", { error: String(error) })
      })
    }, flushIntervalMs)
    flushTimer.unref()
  }

  return {
    async log(partial): Promise<ActivityEvent> {
      const now = clock()
      const event: ActivityEvent = {
        ...partial,
        id: ulid(now.getTime()),
        timestamp: now.toISOString(),
      }

      buffer.push(event)

      if (buffer.length >= flushThreshold) {
        cancelTimer()
        await flushBuffer()
      } else {
        scheduleFlush()
      }

      return event
    },

    async flush(): Promise<void> {
      cancelTimer()
      await flushBuffer()
    },

    getLogPath(date?: Date): string {
      return getLogPathForDate(date ?? clock())
    },

    async close(): Promise<void> {
      cancelTimer()
      await flushBuffer()
    },
  }
}

import { join, resolve } from "node:path"

export interface TrackerPaths {
  root: string
  data: string
  dbFile: string
  activityDaily: string
}

export function createTrackerPaths(rootDir: string, dataDir = ".commitments", dbFile = "commitments.sqlite"): TrackerPaths {
  const root = resolve(rootDir)
  const data = join(root, dataDir)
  return {
    root,
    data,
    dbFile: join(data, dbFile),
    activityDaily: join(data, "activity", "daily"),
  }
}

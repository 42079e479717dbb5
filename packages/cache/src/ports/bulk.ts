import type { Milliseconds } from "@tiercache/clock"

import type { DatasetId } from "./cache-key"

export type BulkFileRecord = {
  datasetId: DatasetId
  path: string
  lastModified: Date
  lockPath: string
}

/** Sidecar written next to every bulk file. */
export type BulkManifest = {
  datasetId: DatasetId
  /** Unique per download; tells a refresh whether someone else downloaded meanwhile. */
  downloadId: string
  /** Caller-chosen version tag, `null` when none was given. */
  version: string | null
  downloadedAt: string
  sizeInBytes: number
}

export type EnsureOptions = {
  /** A file older than this is downloaded again. */
  freshnessMs?: Milliseconds

  /**
   * Files whose manifest records another version are treated as stale. A file
   * without a manifest never matches a requested version.
   */
  version?: string

  /**
   * Download even if the file is fresh, unless another caller finished a
   * download while this one was waiting for the lock.
   */
  refresh?: boolean
}

export type BulkStats = {
  datasets: number
  totalBytes: number
  oldest: Date | null
  newest: Date | null
}

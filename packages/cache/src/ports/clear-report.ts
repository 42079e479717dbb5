import type { SerializedError } from "@tiercache/errors"

export type TierName = "memory" | "query" | "bulk"

export type ClearFailure = {
  tier: TierName
  /** File that could not be removed, absent when the whole tier failed. */
  path?: string
  error: SerializedError
}

export type ClearReport = {
  /** Number of entries (or files) removed. */
  removed: number
  failures: readonly ClearFailure[]
}

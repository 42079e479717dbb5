import type { AppError } from "@tiercache/errors"

export type TierHit<T> = {
  kind: "hit"
  value: T
}

export type TierMiss = {
  kind: "miss"
}

/** The entry existed but could not be read back. It has already been removed. */
export type TierCorrupt = {
  kind: "corrupt"
  error: AppError
}

export type TierResult<T> = TierHit<T> | TierMiss | TierCorrupt

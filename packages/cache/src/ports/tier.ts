import type { CacheKey } from "./cache-key"
import type { ClearReport, TierName } from "./clear-report"
import type { TierResult } from "./tier-result"

/**
 * A tier the controller reads through: memory, then query.
 */
export interface ReadTier<T> {
  readonly name: TierName

  get(key: CacheKey): Promise<TierResult<T>>

  set(key: CacheKey, value: T): Promise<void>

  invalidate(key: CacheKey): Promise<void>

  clear(): Promise<ClearReport>
}

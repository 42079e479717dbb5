import type { LockKey } from "./lock"
import type { LockTtl } from "./options"

export interface LockLease {
  readonly key: LockKey

  /**
   * Release the lock if still owned. Idempotent, safe to call multiple times.
   */
  release(): Promise<void>

  /**
   * Push the expiry of the lease `ttl` into the future.
   *
   * Returns `false` if the lease is no longer owned (released, or reclaimed
   * by another holder after it expired).
   */
  extend(ttl: LockTtl): Promise<boolean>
}

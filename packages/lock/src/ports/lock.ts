import type { LockLease } from "./lock-lease"
import type { AcquireOptions, TryAcquireOptions } from "./options"

/** Identifies what is being locked; for the file lock, the lock file's path. */
export type LockKey = string

/**
 * Mutual exclusion between callers that may live in different processes.
 * At most one unexpired lease exists per key.
 */
export interface Lock {
  /**
   * Poll for `key` until it is free, `timeoutMs` runs out or `signal` aborts.
   *
   * @returns `null` when the wait ended without a lease.
   */
  acquire(key: LockKey, opts: AcquireOptions): Promise<LockLease | null>

  /** Single attempt; `null` while someone else holds an unexpired lease. */
  tryAcquire(key: LockKey, opts: TryAcquireOptions): Promise<LockLease | null>
}

import type { Lock, LockKey } from "../ports/lock"
import type { AcquireOptions, TryAcquireOptions } from "../ports/options"
import { LockAbortedError, LockTimeoutError } from "./errors"
import { LeaseRenewal, type RenewalOptions } from "./lease-renewal"

export type WithLockOptions = AcquireOptions & {
  /** Keep extending the lease by `ttl` while `fn` runs. */
  renewal?: RenewalOptions
}

export async function tryWithLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
  opts: TryAcquireOptions,
): Promise<T | null> {
  const lease = await lock.tryAcquire(key, opts)

  if (!lease) {
    return null
  }

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}

/**
 * Run `fn` while holding `key`.
 *
 * @throws {LockTimeoutError} when the lock is still held by someone else after `timeoutMs`.
 * @throws {LockAbortedError} when `signal` aborts before acquisition.
 */
export async function withLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
  opts: WithLockOptions,
): Promise<T> {
  const { renewal, ...acquireOpts } = opts

  if (acquireOpts.signal?.aborted) {
    throw new LockAbortedError(key)
  }

  const lease = await lock.acquire(key, acquireOpts)
  if (!lease) {
    if (acquireOpts.signal?.aborted) throw new LockAbortedError(key)
    throw new LockTimeoutError(key, acquireOpts.timeoutMs)
  }

  const renewing = renewal ? new LeaseRenewal(lease, acquireOpts.ttl, renewal) : null

  try {
    return await fn()
  } finally {
    await renewing?.stop()
    await lease.release()
  }
}

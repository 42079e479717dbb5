export { FileLease } from "./adapters/fs/file-lock-lease"
export { FileLock, type FileLockConfig, type FileLockDeps } from "./adapters/fs/file-lock"
export { isProcessAlive } from "./adapters/fs/process-alive"
export { LockAbortedError, LockLostError, LockTimeoutError } from "./core/errors"
export { LeaseRenewal, type RenewalOptions } from "./core/lease-renewal"
export {
  type PollDeps,
  type PollOptions,
  pollUntil,
  type PollUntilFn,
  type PollUntilResult,
} from "./core/polling/poll-until"
export { tryWithLock, withLock, type WithLockOptions } from "./core/with-lock"
export type { Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
export type { AcquireOptions, LockConfig, LockTtl, TryAcquireOptions } from "./ports/options"

import { BaseError } from "@tiercache/errors"
import type { Milliseconds } from "@tiercache/clock"

import type { LockKey } from "../ports/lock"

export class LockTimeoutError extends BaseError<"lock_timeout"> {
  constructor(key: LockKey, timeoutMs: Milliseconds | undefined) {
    super(`Timed out waiting for lock ${key}`, {
      code: "lock_timeout",
      context: { key, timeoutMs: timeoutMs ?? null },
      isRetryable: true,
    })
  }
}

export class LockAbortedError extends BaseError<"lock_aborted"> {
  constructor(key: LockKey) {
    super(`Lock acquisition aborted for ${key}`, {
      code: "lock_aborted",
      context: { key },
    })
  }
}

/** A held lease could not be renewed: it expired and was taken over, or its file went away. */
export class LockLostError extends BaseError<"lock_lost"> {
  constructor(key: LockKey) {
    super(`Lost lock ${key} while holding it`, {
      code: "lock_lost",
      context: { key },
    })
  }
}

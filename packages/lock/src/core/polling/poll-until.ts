import type { Clock, Milliseconds } from "@tiercache/clock"

import { assertPositiveMs, assertValidTimeMs } from "../validation/validation"

export type PollUntilSuccess<T> = { ok: true; value: T }
export type PollUntilTimeoutFailure = { ok: false; reason: "timeout" }
export type PollUntilAbortFailure = { ok: false; reason: "aborted" }
export type PollUntilFailure = PollUntilTimeoutFailure | PollUntilAbortFailure
export type PollUntilResult<T> = PollUntilSuccess<T> | PollUntilFailure

export type PollOptions = {
  pollMs: Milliseconds
  timeoutMs: Milliseconds
  signal?: AbortSignal
}

export type PollDeps = {
  clock: Clock
}

/**
 * Call `fn` until it returns a non-null value, sleeping `pollMs` between
 * attempts. The last sleep is shortened so that one final attempt lands on
 * the deadline.
 */
export async function pollUntil<T>(
  fn: () => Promise<T | null>,
  deps: PollDeps,
  opts: PollOptions,
): Promise<PollUntilResult<T>> {
  assertValidTimeMs(opts.timeoutMs, "timeoutMs")
  assertPositiveMs(opts.pollMs, "pollMs")

  const deadline = deps.clock.nowMs() + opts.timeoutMs

  while (true) {
    if (opts.signal?.aborted) return { ok: false, reason: "aborted" }

    const result = await fn()

    if (result !== null) return { ok: true, value: result }

    const remaining = deadline - deps.clock.nowMs()
    if (remaining <= 0) return { ok: false, reason: "timeout" }

    await deps.clock.sleep(Math.min(opts.pollMs, remaining), opts.signal)
  }
}

export type PollUntilFn = typeof pollUntil

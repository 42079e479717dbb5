import type { Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date.
   *
   * @remarks
   * Used when a timestamp is written somewhere (file mtimes, manifests).
   * Prefer `nowMs()` for age arithmetic.
   */
  now(): Date

  /** Current time as milliseconds since the Unix epoch. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /**
   * Wait `ms` milliseconds. Resolves early (never rejects) when `signal` aborts.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

/**
 * Everything that reads the time or waits goes through a Clock so that
 * freshness checks and lock polling can be driven by a fake in tests.
 */
export type Clock = TimeSource & Sleeper

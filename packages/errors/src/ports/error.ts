/** Machine-readable error code, snake_case by convention (e.g. `lock_timeout`). */
export type ErrorCode = Lowercase<string>

/**
 * Structured diagnostic data attached to an error: dataset ids, cache keys,
 * file paths. Never pre-formatted into the message.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same call later may succeed (e.g. a lock was busy). */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (disk full, lock busy, bad input),
   * `false` for bugs and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used as the `err` payload in logs and in clear reports.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

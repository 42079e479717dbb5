import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * Normalize a caught value into an AppError.
 *
 * BaseError instances pass through. Anything else is wrapped with
 * `isOperational: false`, keeping the original as `cause`.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (err instanceof BaseError) return err

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}

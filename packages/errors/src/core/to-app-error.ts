import type { AppError, ErrorCode } from "../ports/error"
import { BaseError } from "./base-error"

/**
 * Convert a caught value to an AppError.
 *
 * BaseError instances pass through. Everything else is wrapped with
 * `isOperational: false` and the original kept as `cause`.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (err instanceof BaseError) {
    return err
  }

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

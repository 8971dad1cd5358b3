import type { AppError, SerializedError } from "../ports/error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

function isAppErrorShape(err: Error): err is AppError {
  const candidate: Partial<Record<keyof AppError, unknown>> = err
  return (
    typeof candidate.code === "string" &&
    typeof candidate.context === "object" &&
    candidate.context !== null &&
    typeof candidate.isOperational === "boolean" &&
    candidate.timestamp instanceof Date
  )
}

/**
 * Serialize any thrown value to a consistent, JSON-safe shape.
 *
 * App errors keep their code and context, plain errors get code
 * `"unknown"`, anything else is wrapped as `NonErrorThrown`.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof Error) {
    const appError = isAppErrorShape(err)

    return {
      name: err.name,
      code: appError ? err.code : "unknown",
      message: err.message,
      context: appError ? { ...err.context } : {},
      isOperational: appError ? err.isOperational : false,
      timestamp: (appError ? err.timestamp : new Date()).toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

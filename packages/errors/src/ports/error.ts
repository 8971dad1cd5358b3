export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error, e.g. the address that failed
 * validation or the header type that collided.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (a malformed address, a refused
   * delivery), `false` for programmer errors such as passing the wrong kind
   * of argument.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by loggers.
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

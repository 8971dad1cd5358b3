export { BaseError, type BaseErrorOptions } from "./core/base-error"
export { err, ok } from "./core/result"
export { type SerializeOptions, serializeError } from "./core/serialize-error"
export { toAppError } from "./core/to-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
export type { Err, Ok, Result } from "./ports/result"

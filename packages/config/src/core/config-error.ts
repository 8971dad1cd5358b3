import { BaseError, type ErrorContext } from "@missive/errors"

export class ConfigError extends BaseError<"config_invalid"> {
  constructor(message: string, context?: ErrorContext) {
    super(message, { code: "config_invalid", context, isOperational: false })
  }
}

import { BaseError } from "@missive/errors"
import type { AddressFailureReason } from "./validation/validate-address"

export class InvalidAddressError extends BaseError<"invalid_address"> {
  constructor(
    readonly address: string,
    readonly reason: AddressFailureReason,
  ) {
    super(`${address} is not a valid email address`, {
      code: "invalid_address",
      context: { address, reason },
    })
  }
}

export type DuplicateCollection = "recipients" | "headers"

export class DuplicateEntryError extends BaseError<"duplicate_entry"> {
  constructor(
    readonly collection: DuplicateCollection,
    readonly key: string,
  ) {
    super(`${key} is already present in ${collection}`, {
      code: "duplicate_entry",
      context: { collection, key },
    })
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (typeof value !== "object") return typeof value

  return value.constructor?.name ?? "object"
}

/**
 * A caller passed the wrong kind of value. Only reachable from untyped
 * callers, so it is thrown rather than returned.
 */
export class ArgumentTypeError extends BaseError<"argument_type"> {
  constructor(operation: string, expected: string, received: unknown) {
    const actual = describeValue(received)

    super(`${operation} requires a ${expected}; ${actual} encountered`, {
      code: "argument_type",
      context: { operation, expected, received: actual },
      isOperational: false,
    })
  }
}

export class MissingTransportError extends BaseError<"missing_transport"> {
  constructor() {
    super("MailMessage was created without a transport", {
      code: "missing_transport",
      isOperational: false,
    })
  }
}

export class MalformedHeaderError extends BaseError<"malformed_header"> {
  constructor(line: string) {
    super(`Header line has no name: ${line}`, {
      code: "malformed_header",
      context: { line },
    })
  }
}

export class DeliveryFailureError extends BaseError<"delivery_failure"> {
  constructor(
    readonly recipient: string,
    cause?: unknown,
  ) {
    super(`Unable to send to ${recipient}`, {
      code: "delivery_failure",
      context: { recipient },
      cause,
      isRetryable: true,
    })
  }
}

/** Expected failures of message composition. */
export type MailMessageError = InvalidAddressError | DuplicateEntryError

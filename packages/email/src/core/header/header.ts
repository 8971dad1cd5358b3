import { err, ok, type Result } from "@missive/errors"
import { InvalidAddressError } from "../errors"
import { Recipient } from "../recipient/recipient"
import { RecipientList } from "../recipient/recipient-list"
import { describeAddressFailure } from "../validation/validate-address"

export type GenericHeader = {
  readonly kind: "generic"
  readonly type: string
  readonly content: string
}

export type FromHeader = {
  readonly kind: "from"
  readonly type: "From"
  readonly content: string
}

export type ReplyToHeader = {
  readonly kind: "reply-to"
  readonly type: "Reply-To"
  readonly content: string
}

export type CcHeader = {
  readonly kind: "cc"
  readonly type: "Cc"
  readonly recipients: RecipientList
}

export type BccHeader = {
  readonly kind: "bcc"
  readonly type: "Bcc"
  readonly recipients: RecipientList
}

export type RecipientHeader = CcHeader | BccHeader

export type Header = GenericHeader | FromHeader | ReplyToHeader | RecipientHeader

export type HeaderKind = Header["kind"]

export type HeaderOfKind<K extends HeaderKind> = Extract<Header, { kind: K }>

export function genericHeader(type: string, content: string): GenericHeader {
  return { kind: "generic", type, content }
}

export type HeaderFailureReason = "reserved_type" | "invalid_type" | "control_char"

const RESERVED_TYPES: ReadonlySet<string> = new Set(["from", "reply-to", "cc", "bcc"])
const FIELD_NAME = /^[!-9;-~]+$/
const LINE_BREAK = /[\r\n]/

/**
 * Why a generic header may not enter a message's header block, if it may
 * not. Address headers have their own validated variants, so a generic one
 * may not carry their names.
 */
export function describeHeaderFailure(header: Header): HeaderFailureReason | undefined {
  if (header.kind !== "generic") return undefined

  if (RESERVED_TYPES.has(header.type.toLowerCase())) return "reserved_type"
  if (!FIELD_NAME.test(header.type)) return "invalid_type"
  if (LINE_BREAK.test(header.content)) return "control_char"

  return undefined
}

function senderContent(sender: string | Recipient): Result<string, InvalidAddressError> {
  if (sender instanceof Recipient) return ok(sender.render())

  const reason = describeAddressFailure(sender)
  if (reason) return err(new InvalidAddressError(sender, reason))

  return ok(sender)
}

/**
 * A plain string must be a bare valid address. Pass a `Recipient` to render
 * a display name.
 */
export function fromHeader(sender: string | Recipient): Result<FromHeader, InvalidAddressError> {
  const content = senderContent(sender)
  if (!content.ok) return content

  const header: FromHeader = { kind: "from", type: "From", content: content.value }
  return ok(header)
}

/**
 * Validated the same way as From, so a string such as `"Name <a@x.com>"` is
 * refused. Pass a `Recipient` for a named Reply-To.
 */
export function replyToHeader(
  address: string | Recipient,
): Result<ReplyToHeader, InvalidAddressError> {
  const content = senderContent(address)
  if (!content.ok) return content

  const header: ReplyToHeader = { kind: "reply-to", type: "Reply-To", content: content.value }
  return ok(header)
}

/** The header owns a copy; later changes to `recipients` do not reach it. */
export function ccHeader(recipients: Iterable<Recipient> = []): CcHeader {
  return { kind: "cc", type: "Cc", recipients: RecipientList.from(recipients) }
}

export function bccHeader(recipients: Iterable<Recipient> = []): BccHeader {
  return { kind: "bcc", type: "Bcc", recipients: RecipientList.from(recipients) }
}

export function isRecipientHeader(header: Header): header is RecipientHeader {
  return header.kind === "cc" || header.kind === "bcc"
}

export function renderHeader(header: Header): string {
  switch (header.kind) {
    case "generic":
    case "from":
    case "reply-to":
      return `${header.type}: ${header.content}`
    case "cc":
    case "bcc":
      return `${header.type}: ${header.recipients.render()}`
    default: {
      const unreachable: never = header
      return unreachable
    }
  }
}

export function addHeaderRecipient(header: RecipientHeader, recipient: Recipient): boolean {
  return header.recipients.add(recipient)
}

export type SyntaxFailureReason =
  | "missing_at"
  | "local_length"
  | "domain_length"
  | "local_dot_edge"
  | "local_double_dot"
  | "domain_charset"
  | "domain_double_dot"
  | "local_charset"

export type AddressFailureReason =
  | SyntaxFailureReason
  | "domain_unresolved"
  | "name_control_char"

export type AddressParts = {
  local: string
  domain: string
}

const MAX_LOCAL_LENGTH = 64
const MAX_DOMAIN_LENGTH = 255

const DOMAIN_CHARS = /^[A-Za-z0-9.-]+$/
const UNQUOTED_LOCAL = /^(\\.|[A-Za-z0-9!#%&`_=\/$'*+?^{}|~.-])+$/
const QUOTED_LOCAL = /^"(\\"|[^"])+"$/

/**
 * Splits at the last `@`, so quoted local parts may contain `@`.
 */
export function splitAddress(address: string): AddressParts | undefined {
  const at = address.lastIndexOf("@")
  if (at === -1) return undefined

  return { local: address.slice(0, at), domain: address.slice(at + 1) }
}

function byteLength(value: string): number {
  return Buffer.byteLength(value, "utf8")
}

function isLengthWithin(value: string, max: number): boolean {
  const length = byteLength(value)
  return length >= 1 && length <= max
}

function isLocalSyntaxValid(local: string): boolean {
  const unescaped = local.replaceAll("\\\\", "")
  return UNQUOTED_LOCAL.test(unescaped) || QUOTED_LOCAL.test(unescaped)
}

/**
 * Returns the first syntax rule `address` breaks, or `undefined` when it is
 * well formed. Rules are checked in a fixed order.
 */
export function describeAddressFailure(address: string): SyntaxFailureReason | undefined {
  const parts = splitAddress(address)
  if (!parts) return "missing_at"

  const { local, domain } = parts

  if (!isLengthWithin(local, MAX_LOCAL_LENGTH)) return "local_length"
  if (!isLengthWithin(domain, MAX_DOMAIN_LENGTH)) return "domain_length"
  if (local.startsWith(".") || local.endsWith(".")) return "local_dot_edge"
  if (local.includes("..")) return "local_double_dot"
  if (!DOMAIN_CHARS.test(domain)) return "domain_charset"
  if (domain.includes("..")) return "domain_double_dot"
  if (!isLocalSyntaxValid(local)) return "local_charset"

  return undefined
}

/**
 * Pure syntax check of an email address. Never throws and never touches
 * the network; see `AddressValidator` for the optional domain lookup.
 */
export function validateAddress(address: string): boolean {
  return describeAddressFailure(address) === undefined
}

const LINE_BREAK = /[\r\n]/

/** A display name must stay on one header line. */
export function describeNameFailure(name: string | undefined): "name_control_char" | undefined {
  return name !== undefined && LINE_BREAK.test(name) ? "name_control_char" : undefined
}

import { MalformedHeaderError } from "../errors"

export type HeaderField = {
  type: string
  value: string
}

const FOLDED_LINE = /^[ \t]/

/**
 * Reads a CRLF header block back into fields, in order. Lines that begin
 * with whitespace continue the previous field.
 */
export function parseHeaderBlock(block: string): HeaderField[] {
  const fields: HeaderField[] = []

  for (const line of block.split(/\r?\n/)) {
    if (line.trim() === "") continue

    const previous = fields.at(-1)
    if (FOLDED_LINE.test(line)) {
      if (!previous) throw new MalformedHeaderError(line)
      previous.value += line
      continue
    }

    const colon = line.indexOf(":")
    if (colon <= 0) throw new MalformedHeaderError(line)

    fields.push({
      type: line.slice(0, colon).trim(),
      value: line.slice(colon + 1).trim(),
    })
  }

  return fields
}

/**
 * Splits an address header value on commas that sit outside quoted display
 * names and angle brackets.
 */
export function splitAddressList(value: string): string[] {
  const segments: string[] = []
  let current = ""
  let inQuotes = false
  let inAngle = false
  let escaped = false

  for (const char of value) {
    if (escaped) {
      current += char
      escaped = false
      continue
    }

    if (char === "\\") escaped = true
    else if (char === '"') inQuotes = !inQuotes
    else if (!inQuotes && char === "<") inAngle = true
    else if (!inQuotes && char === ">") inAngle = false
    else if (char === "," && !inQuotes && !inAngle) {
      segments.push(current)
      current = ""
      continue
    }

    current += char
  }

  segments.push(current)
  return segments.map((segment) => segment.trim()).filter(Boolean)
}

export type PartitionedHeaders = {
  from?: string
  replyTo: string[]
  cc: string[]
  bcc: string[]
  /** Everything that is not an address header, in block order. */
  other: HeaderField[]
}

/**
 * Parses `block` and pulls out the address headers that providers take as
 * dedicated fields. Names match case-insensitively.
 */
export function partitionHeaderBlock(block: string): PartitionedHeaders {
  const partitioned: PartitionedHeaders = { replyTo: [], cc: [], bcc: [], other: [] }

  for (const field of parseHeaderBlock(block)) {
    switch (field.type.toLowerCase()) {
      case "from":
        partitioned.from ??= field.value
        break
      case "reply-to":
        partitioned.replyTo.push(...splitAddressList(field.value))
        break
      case "cc":
        partitioned.cc.push(...splitAddressList(field.value))
        break
      case "bcc":
        partitioned.bcc.push(...splitAddressList(field.value))
        break
      default:
        partitioned.other.push(field)
    }
  }

  return partitioned
}

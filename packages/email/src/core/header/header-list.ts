import { type Header, type HeaderKind, type HeaderOfKind, renderHeader } from "./header"

/**
 * Ordered headers, unique by `type`. Like `RecipientList`, `set` is a raw
 * slot write that skips the uniqueness check.
 */
export class HeaderList implements Iterable<Header> {
  private readonly items: Header[] = []

  static create(...headers: Header[]): HeaderList {
    const list = new HeaderList()
    for (const header of headers) list.add(header)
    return list
  }

  get length(): number {
    return this.items.length
  }

  add(header: Header): boolean {
    if (this.has(header.type)) return false

    this.items.push(header)
    return true
  }

  has(type: string): boolean {
    return this.lookup(type) !== undefined
  }

  lookup(type: string): Header | undefined {
    return this.items.find((h) => h.type === type)
  }

  lookupKind<K extends HeaderKind>(kind: K): HeaderOfKind<K> | undefined {
    for (const header of this.items) {
      if (isOfKind(header, kind)) return header
    }
    return undefined
  }

  remove(type: string): boolean {
    const index = this.items.findIndex((h) => h.type === type)
    if (index === -1) return false

    this.items.splice(index, 1)
    return true
  }

  /** Swaps the header of the same type in place, or appends. */
  replace(header: Header): void {
    const index = this.items.findIndex((h) => h.type === header.type)
    if (index === -1) this.items.push(header)
    else this.items[index] = header
  }

  at(index: number): Header | undefined {
    return this.items[index]
  }

  set(index: number, header: Header): void {
    if (!Number.isInteger(index) || index < 0 || index > this.items.length) {
      throw new RangeError(`Index ${index} is outside 0..${this.items.length}`)
    }

    this.items[index] = header
  }

  toArray(): Header[] {
    return [...this.items]
  }

  /** CRLF-joined, no trailing CRLF. */
  render(): string {
    return this.items.map(renderHeader).join("\r\n")
  }

  toString(): string {
    return this.render()
  }

  [Symbol.iterator](): Iterator<Header> {
    return this.items[Symbol.iterator]()
  }
}

function isOfKind<K extends HeaderKind>(header: Header, kind: K): header is HeaderOfKind<K> {
  return header.kind === kind
}

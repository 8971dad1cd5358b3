import { Recipient } from "./recipient"

/**
 * Ordered recipients, unique by exact address.
 *
 * `add` is the only mutator that enforces uniqueness. `set` writes a slot
 * directly and can introduce duplicates; use it only when that is intended.
 */
export class RecipientList implements Iterable<Recipient> {
  private readonly items: Recipient[] = []

  static create(): RecipientList {
    return new RecipientList()
  }

  /** Builds a list from `recipients`, dropping repeated addresses. */
  static from(recipients: Iterable<Recipient>): RecipientList {
    const list = new RecipientList()
    for (const recipient of recipients) list.add(recipient)
    return list
  }

  get length(): number {
    return this.items.length
  }

  /** Appends `recipient` unless its address is already present. */
  add(recipient: Recipient): boolean {
    if (!(recipient instanceof Recipient)) return false
    if (this.has(recipient.address)) return false

    this.items.push(recipient)
    return true
  }

  has(address: string): boolean {
    return this.items.some((r) => r.address === address)
  }

  at(index: number): Recipient | undefined {
    return this.items[index]
  }

  /**
   * Raw slot write, bypassing deduplication. `index` may be at most
   * `length`, which appends.
   */
  set(index: number, recipient: Recipient): void {
    if (!Number.isInteger(index) || index < 0 || index > this.items.length) {
      throw new RangeError(`Index ${index} is outside 0..${this.items.length}`)
    }

    this.items[index] = recipient
  }

  addresses(): string[] {
    return this.items.map((r) => r.address)
  }

  toArray(): Recipient[] {
    return [...this.items]
  }

  clear(): void {
    this.items.length = 0
  }

  render(): string {
    return this.items.map((r) => r.render()).join(", ")
  }

  toString(): string {
    return this.render()
  }

  [Symbol.iterator](): Iterator<Recipient> {
    return this.items[Symbol.iterator]()
  }
}

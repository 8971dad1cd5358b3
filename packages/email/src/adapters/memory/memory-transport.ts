import type { MailTransport } from "../../ports/transport"

export type MailDelivery = {
  recipientLine: string
  subject: string
  body: string
  headerBlock: string
}

/**
 * Records every call instead of delivering. Lines passed to `failFor`
 * resolve `false`; everything else resolves `true`.
 */
export class MemoryMailTransport implements MailTransport {
  readonly name = "memory"

  private readonly deliveries: MailDelivery[] = []
  private readonly failing = new Set<string>()

  failFor(...recipientLines: string[]): this {
    for (const line of recipientLines) this.failing.add(line)
    return this
  }

  async send(
    recipientLine: string,
    subject: string,
    body: string,
    headerBlock: string,
  ): Promise<boolean> {
    this.deliveries.push({ recipientLine, subject, body, headerBlock })
    return !this.failing.has(recipientLine)
  }

  /** Every call so far, failed ones included. */
  attempts(): MailDelivery[] {
    return [...this.deliveries]
  }

  clear(): void {
    this.deliveries.length = 0
    this.failing.clear()
  }
}

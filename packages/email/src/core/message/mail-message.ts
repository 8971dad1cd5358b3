import { err, ok, type Result, toAppError } from "@missive/errors"
import { createNullLogger, type Logger } from "@missive/logger"
import type { MailTransport } from "../../ports/transport"
import {
  ArgumentTypeError,
  DeliveryFailureError,
  DuplicateEntryError,
  type MailMessageError,
  MissingTransportError,
} from "../errors"
import {
  type BccHeader,
  bccHeader,
  type CcHeader,
  ccHeader,
  describeHeaderFailure,
  type FromHeader,
  fromHeader,
  genericHeader,
  type Header,
  type ReplyToHeader,
  renderHeader,
  replyToHeader,
} from "../header/header"
import { HeaderList } from "../header/header-list"
import { Recipient } from "../recipient/recipient"
import { RecipientList } from "../recipient/recipient-list"

export type MailerIdentity = {
  product: string
  version: string
}

export const DEFAULT_MAILER: MailerIdentity = { product: "Missive", version: "0.1" }

export type MailMessageDeps = {
  transport?: MailTransport
  logger?: Logger
  mailer?: MailerIdentity
}

export type SendOptions = {
  /** One transport call for the whole To list instead of one per recipient. */
  batch?: boolean
}

/**
 * A message being composed: subject, body, a To list and the other headers.
 *
 * Composition is synchronous and reports expected failures as `Result`s.
 * `send` hands the rendered pieces to the transport and records one
 * `DeliveryFailureError` per failed call.
 */
export class MailMessage {
  subject = ""
  body = ""

  private recipients = new RecipientList()
  private headerList: HeaderList
  private deliveryFailures: DeliveryFailureError[] = []

  private readonly transport: MailTransport | undefined
  private readonly mailer: MailerIdentity
  private readonly logger: Logger

  constructor(deps: MailMessageDeps = {}) {
    this.transport = deps.transport
    this.mailer = deps.mailer ?? DEFAULT_MAILER
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "mail-message",
      ...(deps.transport && { transport: deps.transport.name }),
    })
    this.headerList = this.defaultHeaders()
  }

  from(): FromHeader | undefined {
    return this.headerList.lookupKind("from")
  }

  replyTo(): ReplyToHeader | undefined {
    return this.headerList.lookupKind("reply-to")
  }

  cc(): CcHeader | undefined {
    return this.headerList.lookupKind("cc")
  }

  bcc(): BccHeader | undefined {
    return this.headerList.lookupKind("bcc")
  }

  to(): RecipientList {
    return this.recipients
  }

  headers(): HeaderList {
    return this.headerList
  }

  /** One line per failed delivery of the last `send`. */
  errors(): string[] {
    return this.deliveryFailures.map((failure) => failure.message)
  }

  failures(): readonly DeliveryFailureError[] {
    return this.deliveryFailures
  }

  setFrom(sender: string | Recipient): Result<void, MailMessageError> {
    const header = fromHeader(sender)
    if (!header.ok) return header

    return this.addUniqueHeader(header.value)
  }

  /** Same rules as `setFrom`: a named Reply-To must be passed as a `Recipient`. */
  setReplyTo(address: string | Recipient): Result<void, MailMessageError> {
    const header = replyToHeader(address)
    if (!header.ok) return header

    return this.addUniqueHeader(header.value)
  }

  setCc(recipients: RecipientList): Result<void, MailMessageError> {
    assertRecipientList("setCc", recipients)
    return this.addUniqueHeader(ccHeader(recipients))
  }

  setBcc(recipients: RecipientList): Result<void, MailMessageError> {
    assertRecipientList("setBcc", recipients)
    return this.addUniqueHeader(bccHeader(recipients))
  }

  addRecipient(address: string, name?: string): Result<void, MailMessageError> {
    const recipient = Recipient.create(address, name)
    if (!recipient.ok) return recipient

    if (!this.recipients.add(recipient.value)) {
      return err(new DuplicateEntryError("recipients", address))
    }

    return ok()
  }

  addMailRecipient(recipient: Recipient): boolean {
    if (!(recipient instanceof Recipient)) {
      throw new ArgumentTypeError("addMailRecipient", "Recipient", recipient)
    }

    return this.recipients.add(recipient)
  }

  /** Replaces the To list. The message keeps its own copy. */
  setTo(recipients: RecipientList): void {
    assertRecipientList("setTo", recipients)
    this.recipients = RecipientList.from(recipients)
  }

  /**
   * Adds a header unless its type is already present. Generic headers named
   * like an address header, or carrying a line break, are refused; use
   * `setFrom`, `setReplyTo`, `setCc` or `setBcc` for those.
   */
  addHeader(header: Header): boolean {
    const reason = describeHeaderFailure(header)
    if (reason) {
      this.logger.warn("header refused", { header: header.type, reason })
      return false
    }

    return this.headerList.add(header)
  }

  reset(): void {
    this.subject = ""
    this.body = ""
    this.recipients = new RecipientList()
    this.headerList = this.defaultHeaders()
    this.deliveryFailures = []
  }

  /**
   * Human-readable form of the message. X-Mailer and Reply-To stay out of it;
   * they only travel in `renderHeaders()`.
   */
  render(): string {
    const from = this.from()
    const cc = this.cc()
    const bcc = this.bcc()

    let text = `${from ? renderHeader(from) : ""}\nTo: ${this.recipients.render()}\n`
    if (cc) text += `${renderHeader(cc)}\n`
    if (bcc) text += `${renderHeader(bcc)}\n`

    return `${text}${this.body}\n\n`
  }

  renderHeaders(): string {
    return this.headerList.render()
  }

  /**
   * Delivers the message and resolves to the number of failed transport
   * calls. Batch mode makes a single call and so resolves to 0 or 1.
   */
  async send(options: SendOptions = {}): Promise<number> {
    this.deliveryFailures = []

    const transport = this.transport
    if (!transport) throw new MissingTransportError()

    const mode = options.batch ? "batch" : "serial"
    const log = this.logger.child({ mode, subject: this.subject })
    const headerBlock = this.renderHeaders()
    const startedAt = Date.now()

    log.debug("sending message", { recipients: this.recipients.length })

    if (options.batch) {
      await this.deliver(transport, this.recipients.render(), headerBlock, log)
    } else {
      for (const recipient of this.recipients) {
        await this.deliver(transport, recipient.render(), headerBlock, log)
      }
    }

    log.debug("message sent", {
      failures: this.deliveryFailures.length,
      durationMs: Date.now() - startedAt,
    })

    return this.deliveryFailures.length
  }

  batchSend(): Promise<number> {
    return this.send({ batch: true })
  }

  private async deliver(
    transport: MailTransport,
    recipientLine: string,
    headerBlock: string,
    log: Logger,
  ): Promise<void> {
    let cause: unknown

    try {
      if (await transport.send(recipientLine, this.subject, this.body, headerBlock)) return
    } catch (e) {
      cause = toAppError(e, "transport_error")
    }

    const failure = new DeliveryFailureError(recipientLine, cause)
    this.deliveryFailures.push(failure)

    log.warn("delivery failed", { recipient: recipientLine, err: cause ?? failure })
  }

  private addUniqueHeader(header: Header): Result<void, MailMessageError> {
    if (!this.headerList.add(header)) {
      return err(new DuplicateEntryError("headers", header.type))
    }

    return ok()
  }

  private defaultHeaders(): HeaderList {
    const { product, version } = this.mailer
    return HeaderList.create(genericHeader("X-Mailer", `${product} ${version}`))
  }
}

function assertRecipientList(operation: string, value: RecipientList): void {
  if (!(value instanceof RecipientList)) {
    throw new ArgumentTypeError(operation, "RecipientList", value)
  }
}

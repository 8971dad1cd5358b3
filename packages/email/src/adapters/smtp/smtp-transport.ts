import { createNullLogger, type Logger } from "@missive/logger"
import type Mail from "nodemailer/lib/mailer"
import { type HeaderField, partitionHeaderBlock, splitAddressList } from "../../core/header/parse-header-block"
import type { MailTransport } from "../../ports/transport"

/** The part of a nodemailer `Transporter` this adapter calls. */
export type SmtpClient = {
  sendMail(options: Mail.Options): Promise<unknown>
}

export type SmtpMailTransportDeps = {
  client: SmtpClient
  logger?: Logger
}

export class SmtpMailTransport implements MailTransport {
  readonly name = "smtp"

  private readonly client: SmtpClient
  private readonly logger: Logger

  constructor(deps: SmtpMailTransportDeps) {
    this.client = deps.client
    this.logger = (deps.logger ?? createNullLogger()).child({ transport: this.name })
  }

  async send(
    recipientLine: string,
    subject: string,
    body: string,
    headerBlock: string,
  ): Promise<boolean> {
    const info = await this.client.sendMail(this.toMailOptions(recipientLine, subject, body, headerBlock))

    const messageId = readString(info, "messageId")
    if (!messageId) {
      this.logger.warn("smtp server returned no message id", { recipient: recipientLine })
      return false
    }

    const accepted = readList(info, "accepted")
    if (accepted?.length === 0) {
      this.logger.warn("smtp server accepted no recipient", {
        recipient: recipientLine,
        messageId,
        rejected: readList(info, "rejected"),
      })
      return false
    }

    this.logger.debug("message accepted", { recipient: recipientLine, messageId })
    return true
  }

  private toMailOptions(
    recipientLine: string,
    subject: string,
    body: string,
    headerBlock: string,
  ): Mail.Options {
    const { from, replyTo, cc, bcc, other } = partitionHeaderBlock(headerBlock)
    const xMailer = other.find((h) => h.type.toLowerCase() === "x-mailer")
    const headers = toHeaderRecord(other.filter((h) => h !== xMailer))

    return {
      ...(from && { from }),
      to: splitAddressList(recipientLine),
      ...(replyTo.length > 0 && { replyTo }),
      ...(cc.length > 0 && { cc }),
      ...(bcc.length > 0 && { bcc }),
      subject,
      text: body,
      ...(xMailer && { xMailer: xMailer.value }),
      ...(Object.keys(headers).length > 0 && { headers }),
    }
  }
}

function toHeaderRecord(fields: HeaderField[]): Record<string, string> {
  return Object.fromEntries(fields.map((h) => [h.type, h.value]))
}

function readString(info: unknown, key: string): string | undefined {
  if (typeof info !== "object" || info === null || !(key in info)) return undefined

  const value: unknown = Reflect.get(info, key)
  return typeof value === "string" && value.length > 0 ? value : undefined
}

/** nodemailer reports accepted/rejected as strings or `{ address }` objects. */
function readList(info: unknown, key: string): string[] | undefined {
  if (typeof info !== "object" || info === null) return undefined

  const value: unknown = Reflect.get(info, key)
  if (!Array.isArray(value)) return undefined

  return value
    .map((a: unknown) => {
      if (typeof a === "string") return a
      if (typeof a === "object" && a && "address" in a && typeof a.address === "string") {
        return a.address
      }

      return null
    })
    .filter((a): a is string => a !== null)
}

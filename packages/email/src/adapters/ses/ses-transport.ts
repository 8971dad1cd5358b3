import {
  SendEmailCommand,
  type SendEmailCommandInput,
  type SendEmailCommandOutput,
} from "@aws-sdk/client-sesv2"
import { createNullLogger, type Logger } from "@missive/logger"
import { partitionHeaderBlock, splitAddressList } from "../../core/header/parse-header-block"
import type { MailTransport } from "../../ports/transport"

/** The part of an `SESv2Client` this adapter calls. */
export type SesClient = {
  send(command: SendEmailCommand): Promise<SendEmailCommandOutput>
}

export type SesMailTransportDeps = {
  client: SesClient
  /** Attached to every message as `ConfigurationSetName`. */
  configurationSetName?: string
  logger?: Logger
}

type SesHeader = { Name: string; Value: string }

export class SesMailTransport implements MailTransport {
  readonly name = "ses"

  private readonly logger: Logger

  constructor(private readonly deps: SesMailTransportDeps) {
    this.logger = (deps.logger ?? createNullLogger()).child({ transport: this.name })
  }

  async send(
    recipientLine: string,
    subject: string,
    body: string,
    headerBlock: string,
  ): Promise<boolean> {
    const input = this.toSendEmailInput(recipientLine, subject, body, headerBlock)
    const response = await this.deps.client.send(new SendEmailCommand(input))

    if (!response.MessageId) {
      this.logger.warn("ses returned no message id", { recipient: recipientLine })
      return false
    }

    this.logger.debug("message accepted", {
      recipient: recipientLine,
      messageId: response.MessageId,
    })
    return true
  }

  private toSendEmailInput(
    recipientLine: string,
    subject: string,
    body: string,
    headerBlock: string,
  ): SendEmailCommandInput {
    const { from, replyTo, cc, bcc, other } = partitionHeaderBlock(headerBlock)
    const headers: SesHeader[] = other.map((h) => ({ Name: h.type, Value: h.value }))

    return {
      ...(from && { FromEmailAddress: from }),
      Destination: {
        ToAddresses: splitAddressList(recipientLine),
        ...(cc.length > 0 && { CcAddresses: cc }),
        ...(bcc.length > 0 && { BccAddresses: bcc }),
      },
      ...(replyTo.length > 0 && { ReplyToAddresses: replyTo }),
      Content: {
        Simple: {
          Subject: { Data: subject },
          Body: { Text: { Data: body } },
          ...(headers.length > 0 && { Headers: headers }),
        },
      },
      ...(this.deps.configurationSetName && {
        ConfigurationSetName: this.deps.configurationSetName,
      }),
    }
  }
}

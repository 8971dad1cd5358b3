import { SESv2Client } from "@aws-sdk/client-sesv2"
import { createNullLogger, type Logger } from "@missive/logger"
import { createTransport } from "nodemailer"
import { MemoryMailTransport } from "../adapters/memory/memory-transport"
import { SesMailTransport } from "../adapters/ses/ses-transport"
import { SmtpMailTransport } from "../adapters/smtp/smtp-transport"
import type { TransportConfig } from "../config/schema"
import type { MailTransport } from "../ports/transport"

export type CreateMailTransportDeps = {
  logger?: Logger
}

export function createMailTransport(
  config: TransportConfig,
  deps: CreateMailTransportDeps = {},
): MailTransport {
  const logger = deps.logger ?? createNullLogger()

  switch (config.kind) {
    case "smtp": {
      const client = createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure,
        ...(config.auth && { auth: config.auth }),
      })

      return new SmtpMailTransport({ client, logger })
    }
    case "ses": {
      const client = new SESv2Client({
        region: config.region,
        ...(config.endpoint && { endpoint: config.endpoint }),
      })

      return new SesMailTransport({
        client: { send: (command) => client.send(command) },
        logger,
        ...(config.configurationSetName && {
          configurationSetName: config.configurationSetName,
        }),
      })
    }
    case "memory":
      return new MemoryMailTransport()
  }
}

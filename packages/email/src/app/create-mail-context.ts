import { createPinoLogger, type Logger } from "@missive/logger"
import { DnsDomainResolver } from "../adapters/dns/dns-domain-resolver"
import { loadMailConfig } from "../config/load-mail-config"
import type { MailConfig } from "../config/schema"
import { MailMessage } from "../core/message/mail-message"
import { AddressValidator } from "../core/validation/address-validator"
import type { DomainResolver } from "../ports/domain-resolver"
import type { MailTransport } from "../ports/transport"
import { createMailTransport } from "./create-mail-transport"

export type MailContextOptions = {
  env?: NodeJS.ProcessEnv
  cwd?: string
  configOverrides?: Record<string, string>

  /** Replace the pieces built from config, mostly for tests. */
  logger?: Logger
  transport?: MailTransport
  resolver?: DomainResolver
}

export type MailContext = {
  config: MailConfig
  logger: Logger
  transport: MailTransport
  validator: AddressValidator

  /** A fresh message wired to this context's transport, logger and mailer. */
  newMessage(): MailMessage
}

export async function createMailContext(options: MailContextOptions = {}): Promise<MailContext> {
  const config = await loadMailConfig(options.env, options.cwd, options.configOverrides)

  const logger =
    options.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.service.name },
    )

  const transport = options.transport ?? createMailTransport(config.transport, { logger })

  const resolver =
    options.resolver ?? (config.validation.domainCheck ? new DnsDomainResolver() : undefined)
  const validator = new AddressValidator({ logger, ...(resolver && { resolver }) })

  logger.debug("mail context ready", {
    transport: transport.name,
    domainCheck: validator.checksDomains,
  })

  return {
    config,
    logger,
    transport,
    validator,
    newMessage: () => new MailMessage({ transport, logger, mailer: config.mailer }),
  }
}

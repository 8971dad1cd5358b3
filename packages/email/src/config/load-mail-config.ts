import { type ConfigSource, DotenvSource, EnvSource, loadConfig, ObjectSource } from "@missive/config"
import {
  type MailConfig,
  type MailEnvConfig,
  mailEnvSchema,
  type TransportConfig,
} from "./schema"

function mapTransport(env: MailEnvConfig): TransportConfig {
  switch (env.MAIL_TRANSPORT) {
    case "smtp":
      return {
        kind: "smtp",
        host: env.MAIL_SMTP_HOST,
        port: env.MAIL_SMTP_PORT,
        secure: env.MAIL_SMTP_SECURE,
        ...(env.MAIL_SMTP_USER !== undefined &&
          env.MAIL_SMTP_PASS !== undefined && {
            auth: { user: env.MAIL_SMTP_USER, pass: env.MAIL_SMTP_PASS },
          }),
      }
    case "ses":
      return {
        kind: "ses",
        region: env.MAIL_SES_REGION,
        ...(env.MAIL_SES_ENDPOINT && { endpoint: env.MAIL_SES_ENDPOINT }),
        ...(env.MAIL_SES_CONFIGURATION_SET && {
          configurationSetName: env.MAIL_SES_CONFIGURATION_SET,
        }),
      }
    case "memory":
      return { kind: "memory" }
  }
}

export function mapEnvToConfig(env: MailEnvConfig): MailConfig {
  return {
    service: {
      name: env.SERVICE_NAME,
    },
    transport: mapTransport(env),
    mailer: {
      product: env.MAILER_PRODUCT,
      version: env.MAILER_VERSION,
    },
    validation: {
      domainCheck: env.MAIL_DOMAIN_CHECK,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

/**
 * Reads `.env` from `cwd` when present, then `env`, then `overrides`; later
 * sources win.
 */
export async function loadMailConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  overrides?: Record<string, string>,
): Promise<MailConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd }),
    new EnvSource({ env }),
    ...(overrides ? [new ObjectSource(overrides)] : []),
  ]

  const result = await loadConfig({ schema: mailEnvSchema, sources })

  return mapEnvToConfig(result.value)
}

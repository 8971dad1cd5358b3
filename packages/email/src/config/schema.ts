import { type LogLevelName, logLevelNames } from "@missive/logger"
import { z } from "zod"
import type { MailerIdentity } from "../core/message/mail-message"

export const transportKinds = ["smtp", "ses", "memory"] as const

export type TransportKind = (typeof transportKinds)[number]

export const mailEnvSchema = z.object({
  SERVICE_NAME: z.string().default("missive"),

  MAIL_TRANSPORT: z.enum(transportKinds).default("memory"),

  MAIL_SMTP_HOST: z.string().default("localhost"),
  MAIL_SMTP_PORT: z.coerce.number().int().positive().default(587),
  MAIL_SMTP_SECURE: z.stringbool().default(false),
  MAIL_SMTP_USER: z.string().optional(),
  MAIL_SMTP_PASS: z.string().optional(),

  MAIL_SES_REGION: z.string().default("us-east-1"),
  MAIL_SES_ENDPOINT: z.url().optional(),
  MAIL_SES_CONFIGURATION_SET: z.string().optional(),

  MAIL_DOMAIN_CHECK: z.stringbool().default(false),

  MAILER_PRODUCT: z.string().min(1).default("Missive"),
  MAILER_VERSION: z.string().min(1).default("0.1"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type MailEnvConfig = z.infer<typeof mailEnvSchema>

export type SmtpTransportConfig = {
  kind: "smtp"
  host: string
  port: number
  secure: boolean
  auth?: { user: string; pass: string }
}

export type SesTransportConfig = {
  kind: "ses"
  region: string
  endpoint?: string
  configurationSetName?: string
}

export type MemoryTransportConfig = {
  kind: "memory"
}

export type TransportConfig = SmtpTransportConfig | SesTransportConfig | MemoryTransportConfig

export type MailConfig = {
  service: {
    name: string
  }

  transport: TransportConfig

  mailer: MailerIdentity

  validation: {
    /** Adds the MX/A lookup to address validation. */
    domainCheck: boolean
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }
}

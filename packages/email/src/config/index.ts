export { loadMailConfig, mapEnvToConfig } from "./load-mail-config"
export {
  type MailConfig,
  type MailEnvConfig,
  type MemoryTransportConfig,
  mailEnvSchema,
  type SesTransportConfig,
  type SmtpTransportConfig,
  type TransportConfig,
  type TransportKind,
  transportKinds,
} from "./schema"

export { DnsDomainResolver, type DnsDomainResolverDeps, type DnsLookups } from "./adapters/dns/dns-domain-resolver"
export { type MailDelivery, MemoryMailTransport } from "./adapters/memory/memory-transport"
export { type SesClient, SesMailTransport, type SesMailTransportDeps } from "./adapters/ses/ses-transport"
export {
  type SmtpClient,
  SmtpMailTransport,
  type SmtpMailTransportDeps,
} from "./adapters/smtp/smtp-transport"
export {
  createMailContext,
  type MailContext,
  type MailContextOptions,
} from "./app/create-mail-context"
export { type CreateMailTransportDeps, createMailTransport } from "./app/create-mail-transport"
export * from "./config"
export {
  ArgumentTypeError,
  DeliveryFailureError,
  type DuplicateCollection,
  DuplicateEntryError,
  InvalidAddressError,
  MalformedHeaderError,
  type MailMessageError,
  MissingTransportError,
} from "./core/errors"
export {
  addHeaderRecipient,
  type BccHeader,
  bccHeader,
  type CcHeader,
  ccHeader,
  describeHeaderFailure,
  type FromHeader,
  fromHeader,
  type GenericHeader,
  genericHeader,
  type Header,
  type HeaderFailureReason,
  type HeaderKind,
  type HeaderOfKind,
  isRecipientHeader,
  type RecipientHeader,
  type ReplyToHeader,
  renderHeader,
  replyToHeader,
} from "./core/header/header"
export { HeaderList } from "./core/header/header-list"
export {
  type HeaderField,
  type PartitionedHeaders,
  parseHeaderBlock,
  partitionHeaderBlock,
  splitAddressList,
} from "./core/header/parse-header-block"
export {
  DEFAULT_MAILER,
  MailMessage,
  type MailMessageDeps,
  type MailerIdentity,
  type SendOptions,
} from "./core/message/mail-message"
export { Recipient, type RecipientJSON } from "./core/recipient/recipient"
export { RecipientList } from "./core/recipient/recipient-list"
export {
  AddressValidator,
  type AddressValidatorDeps,
} from "./core/validation/address-validator"
export {
  type AddressFailureReason,
  type AddressParts,
  describeAddressFailure,
  describeNameFailure,
  type SyntaxFailureReason,
  splitAddress,
  validateAddress,
} from "./core/validation/validate-address"
export type { DomainResolver } from "./ports/domain-resolver"
export type { MailTransport } from "./ports/transport"

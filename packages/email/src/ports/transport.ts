/**
 * Hands one rendered message to a delivery mechanism.
 *
 * `recipientLine` is either a single rendered recipient or a comma-joined
 * To list. `headerBlock` is the CRLF-joined header lines without a trailing
 * CRLF. Resolves `false` when the provider did not accept the message.
 */
export interface MailTransport {
  /** Short adapter name used in logs, e.g. "smtp". */
  readonly name: string

  send(recipientLine: string, subject: string, body: string, headerBlock: string): Promise<boolean>
}

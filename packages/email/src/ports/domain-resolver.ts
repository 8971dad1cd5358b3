/**
 * Answers whether a domain can receive mail.
 */
export interface DomainResolver {
  /** Resolves `true` when `domain` has at least one MX or A record. */
  hasMxOrA(domain: string): Promise<boolean>
}

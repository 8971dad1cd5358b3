import { createNullLogger, type Logger } from "@missive/logger"
import type { DomainResolver } from "../../ports/domain-resolver"
import { type AddressFailureReason, describeAddressFailure, splitAddress } from "./validate-address"

export type AddressValidatorDeps = {
  /** Enables the DNS step. Without it only syntax is checked. */
  resolver?: DomainResolver
  logger?: Logger
}

export class AddressValidator {
  private readonly resolver: DomainResolver | undefined
  private readonly logger: Logger

  constructor(deps: AddressValidatorDeps = {}) {
    this.resolver = deps.resolver
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "address-validator" })
  }

  get checksDomains(): boolean {
    return this.resolver !== undefined
  }

  isSyntaxValid(address: string): boolean {
    return describeAddressFailure(address) === undefined
  }

  /**
   * Syntax rules first, then the resolver when one is configured. A resolver
   * that rejects counts as an unresolved domain.
   */
  async check(address: string): Promise<AddressFailureReason | undefined> {
    const syntaxFailure = describeAddressFailure(address)
    if (syntaxFailure) return syntaxFailure

    const parts = splitAddress(address)
    if (!this.resolver || !parts) return undefined

    try {
      if (await this.resolver.hasMxOrA(parts.domain)) return undefined
    } catch (err) {
      this.logger.warn("domain lookup failed", { domain: parts.domain, err })
    }

    return "domain_unresolved"
  }

  async validate(address: string): Promise<boolean> {
    return (await this.check(address)) === undefined
  }
}

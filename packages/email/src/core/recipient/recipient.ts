import { err, ok, type Result } from "@missive/errors"
import { InvalidAddressError } from "../errors"
import type { AddressValidator } from "../validation/address-validator"
import { describeAddressFailure, describeNameFailure } from "../validation/validate-address"

export type RecipientJSON = {
  name: string | null
  address: string
}

/**
 * A validated address with an optional display name. Instances only come
 * from the factories, so every Recipient holds a valid address.
 */
export class Recipient {
  private constructor(
    readonly address: string,
    readonly name?: string,
  ) {}

  static create(address: string, name?: string): Result<Recipient, InvalidAddressError> {
    const reason = describeAddressFailure(address) ?? describeNameFailure(name)
    if (reason) return err(new InvalidAddressError(address, reason))

    return ok(new Recipient(address, name))
  }

  /**
   * Like `create`, but also runs the validator's domain lookup when it has a
   * resolver.
   */
  static async verify(
    address: string,
    validator: AddressValidator,
    name?: string,
  ): Promise<Result<Recipient, InvalidAddressError>> {
    const reason = describeNameFailure(name) ?? (await validator.check(address))
    if (reason) return err(new InvalidAddressError(address, reason))

    return ok(new Recipient(address, name))
  }

  /** Names containing address specials are quoted so list splitting keeps them whole. */
  render(): string {
    if (this.name === undefined) return this.address

    return `${quoteDisplayName(this.name)} <${this.address}>`
  }

  toString(): string {
    return this.render()
  }

  toJSON(): RecipientJSON {
    return { name: this.name ?? null, address: this.address }
  }
}

const NAME_SPECIALS = /[()<>[\]:;@\\,."]/

function quoteDisplayName(name: string): string {
  if (!NAME_SPECIALS.test(name)) return name

  return `"${name.replaceAll(/["\\]/g, "\\$&")}"`
}

import { mock } from "vitest-mock-extended"
import type { DomainResolver } from "../../../ports/domain-resolver"
import { InvalidAddressError } from "../../errors"
import { AddressValidator } from "../../validation/address-validator"
import { Recipient } from "../recipient"

function created(address: string, name?: string): Recipient {
  const result = Recipient.create(address, name)
  if (!result.ok) throw result.error
  return result.value
}

describe("Recipient", () => {
  describe("create", () => {
    it("accepts a valid address without a name", () => {
      const recipient = created("a@x.com")

      expect(recipient.address).toBe("a@x.com")
      expect(recipient.name).toBeUndefined()
    })

    it("keeps the display name", () => {
      expect(created("a@x.com", "Ada Lovelace").name).toBe("Ada Lovelace")
    })

    it("fails with InvalidAddressError for a malformed address", () => {
      const result = Recipient.create("trailing.@x.com")

      expect(result.ok).toBe(false)
      if (result.ok) return

      expect(result.error).toBeInstanceOf(InvalidAddressError)
      expect(result.error.message).toBe("trailing.@x.com is not a valid email address")
      expect(result.error.reason).toBe("local_dot_edge")
      expect(result.error.context).toEqual({ address: "trailing.@x.com", reason: "local_dot_edge" })
    })

    it("rejects the empty address", () => {
      expect(Recipient.create("").ok).toBe(false)
    })

    it("rejects a display name with a line break", () => {
      const result = Recipient.create("c@x.com", "Eve\r\nBcc: d@x.com")

      expect(result.ok).toBe(false)
      expect(!result.ok && result.error.reason).toBe("name_control_char")
    })
  })

  describe("verify", () => {
    it("rejects a display name with a line break before any lookup", async () => {
      const resolver = mock<DomainResolver>()

      const result = await Recipient.verify("a@x.com", new AddressValidator({ resolver }), "A\nB")

      expect(!result.ok && result.error.reason).toBe("name_control_char")
      expect(resolver.hasMxOrA).not.toHaveBeenCalled()
    })

    it("fails when the domain does not resolve", async () => {
      const resolver = mock<DomainResolver>()
      resolver.hasMxOrA.mockResolvedValue(false)

      const result = await Recipient.verify("a@x.com", new AddressValidator({ resolver }), "Ada")

      expect(result.ok).toBe(false)
      expect(!result.ok && result.error.reason).toBe("domain_unresolved")
    })

    it("builds the recipient when the domain resolves", async () => {
      const resolver = mock<DomainResolver>()
      resolver.hasMxOrA.mockResolvedValue(true)

      const result = await Recipient.verify("a@x.com", new AddressValidator({ resolver }), "Ada")

      expect(result.ok && result.value.render()).toBe("Ada <a@x.com>")
    })
  })

  describe("rendering", () => {
    it("renders the bare address without a name", () => {
      expect(created("a@x.com").render()).toBe("a@x.com")
    })

    it("renders name <address> with a name", () => {
      expect(created("a@x.com", "Ada").render()).toBe("Ada <a@x.com>")
    })

    it("quotes a name containing address specials", () => {
      expect(created("j@x.com", "Doe, John").render()).toBe('"Doe, John" <j@x.com>')
      expect(created("j@x.com", 'J. "Jay" Doe').render()).toBe('"J. \\"Jay\\" Doe" <j@x.com>')
    })

    it("renders an empty name as given", () => {
      expect(created("a@x.com", "").render()).toBe(" <a@x.com>")
    })

    it("uses render for string conversion", () => {
      expect(`${created("a@x.com", "Ada")}`).toBe("Ada <a@x.com>")
    })

    it("serializes to JSON with a null name when absent", () => {
      expect(JSON.stringify(created("a@x.com"))).toBe('{"name":null,"address":"a@x.com"}')
      expect(created("a@x.com", "Ada").toJSON()).toEqual({ name: "Ada", address: "a@x.com" })
    })
  })
})

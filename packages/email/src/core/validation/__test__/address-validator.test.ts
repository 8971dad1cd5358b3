import type { Logger } from "@missive/logger"
import { mock } from "vitest-mock-extended"
import type { DomainResolver } from "../../../ports/domain-resolver"
import { AddressValidator } from "../address-validator"

describe("AddressValidator", () => {
  it("checks syntax only when no resolver is configured", async () => {
    const validator = new AddressValidator()

    expect(validator.checksDomains).toBe(false)
    expect(await validator.validate("a@unresolvable.invalid")).toBe(true)
    expect(await validator.check("bad@")).toBe("domain_length")
  })

  it("isSyntaxValid never consults the resolver", () => {
    const resolver = mock<DomainResolver>()
    const validator = new AddressValidator({ resolver })

    expect(validator.isSyntaxValid("a@x.com")).toBe(true)
    expect(resolver.hasMxOrA).not.toHaveBeenCalled()
  })

  it("passes when the resolver finds a record", async () => {
    const resolver = mock<DomainResolver>()
    resolver.hasMxOrA.mockResolvedValue(true)

    const validator = new AddressValidator({ resolver })

    expect(await validator.validate("a@example.com")).toBe(true)
    expect(resolver.hasMxOrA).toHaveBeenCalledWith("example.com")
  })

  it("fails with domain_unresolved when the resolver finds nothing", async () => {
    const resolver = mock<DomainResolver>()
    resolver.hasMxOrA.mockResolvedValue(false)

    const validator = new AddressValidator({ resolver })

    expect(await validator.check("a@example.com")).toBe("domain_unresolved")
  })

  it("does not resolve domains of syntactically invalid addresses", async () => {
    const resolver = mock<DomainResolver>()
    const validator = new AddressValidator({ resolver })

    expect(await validator.check(".a@example.com")).toBe("local_dot_edge")
    expect(resolver.hasMxOrA).not.toHaveBeenCalled()
  })

  it("treats a failing lookup as unresolved and logs it", async () => {
    const resolver = mock<DomainResolver>()
    const lookupError = new Error("SERVFAIL")
    resolver.hasMxOrA.mockRejectedValue(lookupError)

    const logger = mock<Logger>()
    logger.child.mockReturnValue(logger)

    const validator = new AddressValidator({ resolver, logger })

    expect(await validator.validate("a@example.com")).toBe(false)
    expect(logger.warn).toHaveBeenCalledWith("domain lookup failed", {
      domain: "example.com",
      err: lookupError,
    })
  })
})

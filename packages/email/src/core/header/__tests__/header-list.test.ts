import { ccHeader, fromHeader, genericHeader, type FromHeader } from "../header"
import { HeaderList } from "../header-list"

function from(address: string): FromHeader {
  const result = fromHeader(address)
  if (!result.ok) throw result.error
  return result.value
}

describe("HeaderList", () => {
  it("keeps the first header of a type", () => {
    const list = new HeaderList()

    expect(list.add(from("a@x.com"))).toBe(true)
    expect(list.add(from("b@x.com"))).toBe(false)

    expect(list.length).toBe(1)
    expect(list.lookup("From")).toEqual({ kind: "from", type: "From", content: "a@x.com" })
  })

  it("treats a generic header with a reserved name as that type", () => {
    const list = HeaderList.create(from("a@x.com"))

    expect(list.add(genericHeader("From", "b@x.com"))).toBe(false)
  })

  it("lookup returns undefined for an absent type", () => {
    expect(new HeaderList().lookup("Cc")).toBeUndefined()
  })

  it("lookupKind narrows to the variant", () => {
    const list = HeaderList.create(genericHeader("X-Mailer", "Test 1"), ccHeader())

    expect(list.lookupKind("cc")?.recipients.length).toBe(0)
    expect(list.lookupKind("from")).toBeUndefined()
  })

  it("renders headers joined by CRLF without a trailing CRLF", () => {
    const list = HeaderList.create(genericHeader("X-Mailer", "Test 1"), from("a@x.com"))

    expect(list.render()).toBe("X-Mailer: Test 1\r\nFrom: a@x.com")
  })

  it("renders the empty list as the empty string", () => {
    expect(new HeaderList().render()).toBe("")
  })

  describe("remove and replace", () => {
    it("remove drops the header by type", () => {
      const list = HeaderList.create(genericHeader("X-Mailer", "Test 1"))

      expect(list.remove("X-Mailer")).toBe(true)
      expect(list.remove("X-Mailer")).toBe(false)
      expect(list.length).toBe(0)
    })

    it("replace swaps in place", () => {
      const list = HeaderList.create(genericHeader("X-Mailer", "Test 1"), from("a@x.com"))

      list.replace(genericHeader("X-Mailer", "Other 2"))

      expect(list.render()).toBe("X-Mailer: Other 2\r\nFrom: a@x.com")
    })

    it("replace appends when the type is absent", () => {
      const list = new HeaderList()

      list.replace(genericHeader("X-Mailer", "Test 1"))

      expect(list.length).toBe(1)
    })
  })

  it("set writes a slot without the uniqueness check", () => {
    const list = HeaderList.create(from("a@x.com"))

    list.set(1, from("b@x.com"))

    expect(list.render()).toBe("From: a@x.com\r\nFrom: b@x.com")
    expect(() => list.set(5, from("c@x.com"))).toThrow(RangeError)
  })

  it("iterates in insertion order", () => {
    const list = HeaderList.create(genericHeader("A", "1"), genericHeader("B", "2"))

    expect([...list].map((h) => h.type)).toEqual(["A", "B"])
    expect(list.at(1)?.type).toBe("B")
  })
})

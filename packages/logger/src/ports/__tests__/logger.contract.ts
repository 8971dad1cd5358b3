import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** One written entry, with the adapter's own field names normalized. */
export type LogEntry = {
  level: LogLevelName
  message: unknown
  fields: Record<string, unknown>
}

export type LoggerFixture = {
  logger: Logger
  entries: () => LogEntry[]
  reset: () => void
}

export type LoggerContractTarget = {
  name: string
  create: (level: LogLevelName) => LoggerFixture
}

export function describeLoggerContract(target: LoggerContractTarget) {
  describe(`Logger contract: ${target.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, entries } = target.create("trace")

      const parent = logger.child({ transport: "smtp" })
      const child = parent.child({ recipient: "b@x.com" })

      child.info("delivered")

      const logs = entries()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.fields).toMatchObject({
        transport: "smtp",
        recipient: "b@x.com",
      })
    })

    it("child() overrides on key conflict", () => {
      const { logger, entries } = target.create("trace")

      const child = logger.child({ mode: "serial" }).child({ mode: "batch" })

      child.info("sending")

      expect(entries()[0]?.fields.mode).toBe("batch")
    })

    it("child() does not mutate the parent", () => {
      const { logger, entries } = target.create("trace")

      const parent = logger.child({ transport: "smtp" })
      const child = parent.child({ recipient: "b@x.com" })

      parent.info("parent")
      child.info("child")

      const logs = entries()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.fields).toMatchObject({ transport: "smtp" })
      expect(logs[0]?.fields).not.toHaveProperty("recipient")
      expect(logs[1]?.fields).toMatchObject({ transport: "smtp", recipient: "b@x.com" })
    })

    it("per-call meta overrides context", () => {
      const { logger, entries } = target.create("trace")

      logger.child({ recipient: "a@x.com" }).warn("failed", { recipient: "b@x.com" })

      expect(entries()[0]?.fields.recipient).toBe("b@x.com")
    })

    it("records the message text apart from the fields", () => {
      const { logger, entries } = target.create("trace")

      logger.debug("message sent", { failures: 0 })

      expect(entries()).toEqual([
        expect.objectContaining({ level: "debug", message: "message sent" }),
      ])
      expect(entries()[0]?.fields).toMatchObject({ failures: 0 })
    })

    it("writes an error passed as err with its message", () => {
      const { logger, entries } = target.create("trace")

      logger.warn("delivery failed", { recipient: "b@x.com", err: new Error("refused") })

      expect(entries()[0]?.fields).toMatchObject({
        recipient: "b@x.com",
        err: { message: "refused" },
      })
    })

    it("suppresses entries below the configured level", () => {
      const { logger, entries } = target.create("warn")

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(entries().map((l) => l.level)).toEqual(["warn", "error"])
    })

    it("fixture reset forgets captured entries", () => {
      const { logger, entries, reset } = target.create("trace")

      logger.info("one")
      reset()
      logger.info("two")

      expect(entries()).toHaveLength(1)
    })
  })
}

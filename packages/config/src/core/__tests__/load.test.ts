import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigError } from "../config-error"
import { loadConfig } from "../load"

const schema = z.object({
  MAIL_SMTP_HOST: z.string(),
  MAIL_SMTP_PORT: z.coerce.number().default(587),
})

describe("loadConfig", () => {
  it("validates and coerces merged values", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { MAIL_SMTP_HOST: "localhost", MAIL_SMTP_PORT: "2525" } })],
    })

    expect(config.value).toEqual({ MAIL_SMTP_HOST: "localhost", MAIL_SMTP_PORT: 2525 })
  })

  it("lets later sources override earlier ones", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { MAIL_SMTP_HOST: "from-env" } }),
        new ObjectSource({ MAIL_SMTP_HOST: "from-override" }),
      ],
    })

    expect(config.get("MAIL_SMTP_HOST")).toBe("from-override")
    expect(config.explain("MAIL_SMTP_HOST")).toBe("object:overrides")
  })

  it("treats undefined values as not provided", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ MAIL_SMTP_HOST: "kept" }),
        new ObjectSource({ MAIL_SMTP_HOST: undefined }, "later"),
      ],
    })

    expect(config.get("MAIL_SMTP_HOST")).toBe("kept")
  })

  it("reports schema defaults and unknown keys", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ MAIL_SMTP_HOST: "localhost", EXTRA: "1" })],
    })

    expect(config.explain("MAIL_SMTP_PORT")).toBe("default")
    expect(config.unknownKeys()).toEqual(["EXTRA"])
  })

  it("throws a ConfigError listing the failing keys", async () => {
    const load = loadConfig({ schema, sources: [new ObjectSource({ MAIL_SMTP_PORT: "x" })] })

    const error = await load.catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ConfigError)
    expect(error).toMatchObject({ code: "config_invalid" })
    expect(error).toHaveProperty(
      "context.issues",
      expect.arrayContaining(["MAIL_SMTP_HOST", "MAIL_SMTP_PORT"]),
    )
  })
})

import type { ConfigSource } from "../../ports/source"

type Environment = Record<string, string | undefined>

export type EnvSourceOptions = {
  /** Only keys starting with this are loaded, with the prefix stripped. */
  prefix?: string
  env?: Environment

  /**
   * Treat variables set to an empty or whitespace-only string as unset, so
   * `MAIL_SMTP_USER=` falls through to later defaults. Defaults to true.
   */
  ignoreBlank?: boolean
}

/** Reads configuration from process environment variables. */
export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly options: EnvSourceOptions = {}) {}

  async load(): Promise<Record<string, unknown>> {
    const { prefix = "", env = process.env, ignoreBlank = true } = this.options
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(env)) {
      if (value === undefined || !key.startsWith(prefix)) continue
      if (ignoreBlank && value.trim() === "") continue

      values[key.slice(prefix.length)] = value
    }

    return values
  }
}

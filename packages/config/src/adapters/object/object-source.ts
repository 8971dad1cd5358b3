import type { ConfigSource } from "../../ports/source"

/**
 * In-code values, typically overrides layered last or fixtures in tests.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Record<string, unknown>,
    label = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}

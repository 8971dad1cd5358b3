import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  private readonly data: Readonly<T>

  constructor(
    data: T,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
  ) {
    this.data = Object.freeze({ ...data })
  }

  get value(): Readonly<T> {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.data).filter((k): k is keyof T & string => k in this.data)
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.keys().map((k) => this.explain(k)))]
  }

  unknownKeys(): string[] {
    const known = new Set<string>(this.keys())

    return [...this.providedKeys].filter((k) => !known.has(k))
  }
}

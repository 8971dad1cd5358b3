/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ MAIL_SMTP_PORT: z.coerce.number().default(587) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("MAIL_SMTP_PORT")     // 2525
 * config.explain("MAIL_SMTP_PORT") // "dotenv:.env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /** Name of the source that provided `key`, or "default" for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that provided at least one schema key. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not define. */
  unknownKeys(): string[]
}

/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and defaults belong to the schema
 * passed to `loadConfig`. Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "dotenv:.env" */
  readonly name: string

  /**
   * Resolve to a fresh object on every call. A key mapped to `undefined`
   * counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}

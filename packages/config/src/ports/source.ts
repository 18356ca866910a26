/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and merging happen in
 * `loadConfig`; later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. `"env"` or `"dotenv:.env.local"`. */
  readonly name: string

  /**
   * Flat key/value pairs. An `undefined` value means "not provided" and does
   * not override an earlier source.
   */
  load(): Promise<Record<string, unknown>>
}

/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ REDIS_URL: z.string().default("redis://localhost:6379") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.REDIS_URL       // "redis://localhost:6379"
 * config.explain("REDIS_URL")  // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Name of the source that supplied `key`, or `"default"` for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct provenance labels, in the order first seen. */
  sourcesUsed(): string[]

  /** Keys supplied by some source that the schema does not know. */
  unknownKeys(): string[]
}

/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ CACHE_DIR: z.string(), LOCK_POLL_MS: z.coerce.number().default(100) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("LOCK_POLL_MS")    // 100
 * config.explain("CACHE_DIR")   // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /** Source name that supplied `key`, or "default" when the schema filled it in. */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that supplied at least one value. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know. Usually typos. */
  unknownKeys(): string[]
}

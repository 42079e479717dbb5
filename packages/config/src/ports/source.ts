/**
 * A source of raw configuration values.
 *
 * Sources only load. Coercion and validation belong to the schema passed to
 * `loadConfig`, and sources listed later override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env", "dotenv:.env", "json:tiercache.json". */
  readonly name: string

  /**
   * Env-style sources yield string values; JSON and object sources may yield
   * numbers and booleans. An `undefined` value means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}

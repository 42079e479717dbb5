import { stripPrefix } from "../core/prefix"
import type { ConfigSource } from "../ports/source"

export type EnvSourceOptions = {
  /** e.g. "TIERCACHE_": only matching variables are read, without the prefix. */
  prefix?: string
  /** Defaults to `process.env`. */
  env?: Readonly<Record<string, string | undefined>>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly options: EnvSourceOptions = {}) {}

  async load(): Promise<Record<string, unknown>> {
    return stripPrefix(this.options.env ?? process.env, this.options.prefix)
  }
}

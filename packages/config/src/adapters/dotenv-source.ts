import { parse } from "dotenv"
import { stripPrefix } from "../core/prefix"
import type { ConfigSource } from "../ports/source"
import { type FileSourceOptions, readConfigFile } from "./file-source"

export type DotenvSourceOptions = FileSourceOptions & {
  /** Same meaning as for `EnvSource`. */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.opts)
    if (content === null) return {}

    return stripPrefix(parse(content), this.opts.prefix)
  }
}

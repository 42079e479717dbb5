import { BaseError } from "@tiercache/errors"
import { z } from "zod"
import type { ConfigSource } from "../ports/source"
import { type FileSourceOptions, readConfigFile } from "./file-source"

const jsonObject = z.record(z.string(), z.unknown())

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: FileSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.opts)
    if (content === null) return {}

    const parsed = jsonObject.safeParse(JSON.parse(content))

    if (!parsed.success) {
      throw new BaseError(`${this.opts.file} must contain a JSON object`, {
        code: "config_invalid",
        context: { file: this.opts.file },
      })
    }

    return parsed.data
  }
}

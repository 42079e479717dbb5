import fs from "node:fs/promises"
import path from "node:path"

export type FileSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string

  /** When `false`, a missing file loads as an empty config. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

/**
 * Read a config file as text, or `null` when it is optional and missing.
 */
export async function readConfigFile(opts: FileSourceOptions): Promise<string | null> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!opts.required && isNotFound(err)) return null
    throw err
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && Reflect.get(err, "code") === "ENOENT"
}

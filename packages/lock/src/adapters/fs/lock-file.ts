import { readFile, stat } from "node:fs/promises"

import { isNotFound } from "@tiercache/errors"
import { z } from "zod"

export const lockRecordSchema = z.object({
  token: z.string().min(1),
  pid: z.number().int(),
  hostname: z.string(),
  acquiredAt: z.number(),
  expiresAt: z.number(),
})

export type LockRecord = z.infer<typeof lockRecordSchema>

/**
 * What a lock file currently says. `unreadable` covers a holder that crashed
 * between creating the file and writing its record.
 */
export type LockFileState =
  | { kind: "missing" }
  | { kind: "held"; record: LockRecord }
  | { kind: "unreadable"; modifiedAtMs: number }

export async function readLockFile(path: string): Promise<LockFileState> {
  let raw: string

  try {
    raw = await readFile(path, "utf8")
  } catch (err) {
    if (isNotFound(err)) return { kind: "missing" }
    throw err
  }

  const parsed = lockRecordSchema.safeParse(parseJson(raw))
  if (parsed.success) return { kind: "held", record: parsed.data }

  try {
    const stats = await stat(path)
    return { kind: "unreadable", modifiedAtMs: stats.mtimeMs }
  } catch (err) {
    if (isNotFound(err)) return { kind: "missing" }
    throw err
  }
}

export function sameHolder(a: LockFileState, b: LockFileState): boolean {
  if (a.kind === "held" && b.kind === "held") return a.record.token === b.record.token
  if (a.kind === "unreadable" && b.kind === "unreadable") {
    return a.modifiedAtMs === b.modifiedAtMs
  }
  return false
}

function parseJson(raw: string): unknown {
  try {
    const value: unknown = JSON.parse(raw)
    return value
  } catch {
    return undefined
  }
}

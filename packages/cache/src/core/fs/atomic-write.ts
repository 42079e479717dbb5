import { randomUUID } from "node:crypto"
import { mkdir, readdir, rename, rm, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

import { isNotFound } from "@tiercache/errors"

import { StorageError } from "../errors"

const TEMP_MARKER = ".tmp-"

/**
 * Write `data` to `path` so that readers see either the old file or the
 * complete new one. The temporary file lives in the same directory, which
 * keeps the final rename on one file system.
 *
 * @throws {StorageError} after removing the temporary file. A failed removal
 *   is carried in its `cleanupError` context.
 */
export async function writeFileAtomic(path: string, data: Uint8Array | string): Promise<void> {
  const dir = dirname(path)
  const tmp = `${path}${TEMP_MARKER}${process.pid}-${randomUUID()}`

  try {
    await mkdir(dir, { recursive: true })
  } catch (err) {
    throw new StorageError(dir, "mkdir", err)
  }

  try {
    await writeFile(tmp, data)
  } catch (err) {
    throw new StorageError(path, "write", err, await discardTemp(tmp))
  }

  try {
    await rename(tmp, path)
  } catch (err) {
    throw new StorageError(path, "rename", err, await discardTemp(tmp))
  }
}

/** Remove a temp file left by a failed write; returns the error instead of throwing it. */
async function discardTemp(tmp: string): Promise<unknown> {
  try {
    await rm(tmp, { force: true })
    return undefined
  } catch (err) {
    return err
  }
}

export function isTempFile(name: string): boolean {
  return name.includes(TEMP_MARKER)
}

/** `true` if the file was there. */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await rm(path)
    return true
  } catch (err) {
    if (isNotFound(err)) return false
    throw err
  }
}

/** Names of the regular files in `dir`; a missing directory is empty. */
export async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true })
    return entries.filter((e) => e.isFile()).map((e) => e.name).sort()
  } catch (err) {
    if (isNotFound(err)) return []
    throw err
  }
}

export function filePath(dir: string, name: string, format: string): string {
  return join(dir, `${name}.${format}`)
}

import { readFile } from "node:fs/promises"

import { isNotFound } from "@tiercache/errors"
import { z } from "zod"

import type { BulkManifest } from "../../ports/bulk"

export const MANIFEST_SUFFIX = ".meta.json"

const bulkManifestSchema = z.object({
  datasetId: z.string(),
  downloadId: z.string().min(1),
  version: z.string().nullable(),
  downloadedAt: z.iso.datetime(),
  sizeInBytes: z.number().int().nonnegative(),
})

/**
 * Read a manifest sidecar. A missing or malformed sidecar reads as `null`;
 * the bulk file it describes is then treated as unversioned.
 */
export async function readManifest(path: string): Promise<BulkManifest | null> {
  let raw: string

  try {
    raw = await readFile(path, "utf8")
  } catch (err) {
    if (isNotFound(err)) return null
    throw err
  }

  const parsed = bulkManifestSchema.safeParse(parseJson(raw))

  return parsed.success ? parsed.data : null
}

export function encodeManifest(manifest: BulkManifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`
}

function parseJson(raw: string): unknown {
  try {
    const value: unknown = JSON.parse(raw)
    return value
  } catch {
    return undefined
  }
}

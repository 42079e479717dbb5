import { join } from "node:path"

import { serializeError } from "@tiercache/errors"

import type { ClearFailure, ClearReport, TierName } from "../../ports/clear-report"
import { listFiles, removeFile } from "./atomic-write"

/**
 * Remove every file in `dir`. A file that cannot be removed is reported and
 * the rest are still attempted.
 */
export async function clearDirectory(dir: string, tier: TierName): Promise<ClearReport> {
  const failures: ClearFailure[] = []
  let removed = 0

  for (const name of await listFiles(dir)) {
    const path = join(dir, name)

    try {
      if (await removeFile(path)) removed++
    } catch (err) {
      failures.push({ tier, path, error: serializeError(err) })
    }
  }

  return { removed, failures }
}

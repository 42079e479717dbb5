import { readFile, stat } from "node:fs/promises"
import { join } from "node:path"

import type { Clock, Milliseconds } from "@tiercache/clock"
import { isNotFound } from "@tiercache/errors"
import type { Logger } from "@tiercache/logger"

import { CorruptEntryError, KeyConstructionError } from "../../core/errors"
import { filePath, isTempFile, listFiles, removeFile, writeFileAtomic } from "../../core/fs/atomic-write"
import { clearDirectory } from "../../core/fs/clear-directory"
import { isSafeFileStem } from "../../core/key/dataset-id"
import type { CacheState } from "../../core/state/cache-state"
import type { CacheKey } from "../../ports/cache-key"
import type { ClearReport, TierName } from "../../ports/clear-report"
import type { Serializer } from "../../ports/serializer"
import type { ReadTier } from "../../ports/tier"
import type { TierCorrupt, TierResult } from "../../ports/tier-result"

export type QueryTierDeps<T> = {
  state: CacheState
  serializer: Serializer<T>
  clock: Clock
  logger: Logger
}

export type QueryTierOptions = {
  /** Entries older than this read as misses. Unset means they never expire. */
  ttlMs?: Milliseconds
}

export const QUERIES_DIR = "queries"

/**
 * One file per key under `<base>/queries`. Writes go through a temporary
 * file and a rename, so reads need no lock.
 */
export class QueryTier<T> implements ReadTier<T> {
  public readonly name: TierName = "query"

  private readonly logger: Logger

  public constructor(
    private readonly deps: QueryTierDeps<T>,
    private readonly opts: QueryTierOptions = {},
  ) {
    this.logger = deps.logger.child({ module: "query-tier" })
  }

  get directory(): string {
    return join(this.deps.state.baseDirectory, QUERIES_DIR)
  }

  pathFor(key: CacheKey): string {
    if (!isSafeFileStem(key)) {
      throw new KeyConstructionError("Cache key cannot be used as a file name", { key })
    }

    return filePath(this.directory, key, this.deps.serializer.format)
  }

  async get(key: CacheKey): Promise<TierResult<T>> {
    const path = this.pathFor(key)
    let bytes: Uint8Array

    try {
      if (await this.isExpired(path)) {
        await removeFile(path)
        this.logger.debug("query entry expired", { key, path })
        return { kind: "miss" }
      }

      bytes = await readFile(path)
    } catch (err) {
      if (isNotFound(err)) return { kind: "miss" }
      return await this.discard(key, path, err)
    }

    try {
      return { kind: "hit", value: this.deps.serializer.decode(bytes) }
    } catch (err) {
      return await this.discard(key, path, err)
    }
  }

  async set(key: CacheKey, value: T): Promise<void> {
    const path = this.pathFor(key)
    const bytes = this.deps.serializer.encode(value)

    await writeFileAtomic(path, bytes)

    this.logger.debug("query entry stored", { key, path, sizeInBytes: bytes.byteLength })
  }

  async invalidate(key: CacheKey): Promise<void> {
    await removeFile(this.pathFor(key))
  }

  async clear(): Promise<ClearReport> {
    const report = await clearDirectory(this.directory, this.name)

    this.logger.info("query tier cleared", {
      removed: report.removed,
      failed: report.failures.length,
    })

    return report
  }

  /**
   * Delete entries (and leftover temporary files) older than the TTL.
   *
   * @returns The number of files removed; always 0 without a TTL.
   */
  async cleanupExpired(): Promise<number> {
    if (this.opts.ttlMs === undefined) return 0

    const dir = this.directory
    let removed = 0

    for (const name of await listFiles(dir)) {
      const path = join(dir, name)
      if (!name.endsWith(`.${this.deps.serializer.format}`) && !isTempFile(name)) continue

      try {
        if ((await this.isExpired(path)) && (await removeFile(path))) removed++
      } catch (err) {
        if (!isNotFound(err)) throw err
      }
    }

    this.logger.info("expired query entries removed", { removed })

    return removed
  }

  private async isExpired(path: string): Promise<boolean> {
    if (this.opts.ttlMs === undefined) return false

    const stats = await stat(path)

    return this.deps.clock.nowMs() - stats.mtimeMs > this.opts.ttlMs
  }

  private async discard(key: CacheKey, path: string, cause: unknown): Promise<TierCorrupt> {
    const error = new CorruptEntryError(path, cause)

    try {
      await removeFile(path)
    } catch (err) {
      this.logger.warn("corrupt query entry could not be removed", { key, path, err })
    }

    return { kind: "corrupt", error }
  }
}

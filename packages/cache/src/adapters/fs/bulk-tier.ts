import { randomUUID } from "node:crypto"
import { readFile, stat, utimes } from "node:fs/promises"
import { join } from "node:path"

import type { Clock, Milliseconds } from "@tiercache/clock"
import { isNotFound } from "@tiercache/errors"
import { type Lock, withLock } from "@tiercache/lock"
import type { Logger } from "@tiercache/logger"

import { CorruptEntryError, StorageError } from "../../core/errors"
import { filePath, isTempFile, listFiles, removeFile, writeFileAtomic } from "../../core/fs/atomic-write"
import { clearDirectory } from "../../core/fs/clear-directory"
import { assertDatasetId, isDatasetId } from "../../core/key/dataset-id"
import type { CacheState } from "../../core/state/cache-state"
import type { BulkFileRecord, BulkManifest, BulkStats, EnsureOptions } from "../../ports/bulk"
import type { DatasetId } from "../../ports/cache-key"
import type { ClearReport } from "../../ports/clear-report"
import type { FetchFn } from "../../ports/fetcher"
import type { Serializer } from "../../ports/serializer"
import { encodeManifest, MANIFEST_SUFFIX, readManifest } from "./bulk-manifest"

export type BulkTierDeps<T> = {
  state: CacheState
  serializer: Serializer<T>
  clock: Clock
  lock: Lock
  logger: Logger
}

export type BulkTierOptions = {
  /** Used when `ensure()` is called without `freshnessMs`. */
  freshnessMs: Milliseconds

  /** Longest wait for another caller's download of the same dataset. */
  lockTimeoutMs: Milliseconds

  /**
   * Lifetime of the dataset's lock. It is renewed every third of this while a
   * download runs, so it only runs out for a holder that stopped.
   */
  lockTtlMs: Milliseconds
}

export const BULK_DIR = "bulk"

type BulkPaths = {
  path: string
  lockPath: string
  manifestPath: string
}

type Inspected = {
  record: BulkFileRecord
  sizeInBytes: number
}

type Decoded<T> = { ok: true; value: T } | { ok: false; error: CorruptEntryError }

/**
 * Whole datasets, one file each under `<base>/bulk`, downloaded at most once
 * per freshness window across every process sharing the directory.
 *
 * A download happens under the dataset's lock file. Callers that lost the
 * race for the lock re-check the file once they hold it and return the
 * winner's download instead of fetching again.
 */
export class BulkTier<T> {
  private readonly logger: Logger

  public constructor(
    private readonly deps: BulkTierDeps<T>,
    private readonly opts: BulkTierOptions,
  ) {
    this.logger = deps.logger.child({ module: "bulk-tier" })

    const format = deps.serializer.format
    if (format === "lock" || `.${format}`.endsWith(MANIFEST_SUFFIX)) {
      throw new RangeError(`Serializer format "${format}" collides with the bulk tier's own files`)
    }
  }

  get directory(): string {
    return join(this.deps.state.baseDirectory, BULK_DIR)
  }

  paths(datasetId: DatasetId): BulkPaths {
    assertDatasetId(datasetId)

    const dir = this.directory

    return {
      path: filePath(dir, datasetId, this.deps.serializer.format),
      lockPath: join(dir, `${datasetId}.lock`),
      manifestPath: join(dir, `${datasetId}${MANIFEST_SUFFIX}`),
    }
  }

  /**
   * Path of a fresh copy of `datasetId`, downloading it with `fetchFn` first
   * when the current file is missing, too old, or of another version.
   *
   * @throws {LockTimeoutError} when another download holds the lock past `lockTimeoutMs`.
   * @throws {StorageError} when the downloaded file cannot be written.
   */
  async ensure(datasetId: DatasetId, options: EnsureOptions, fetchFn: FetchFn<T>): Promise<string> {
    const { path, lockPath } = this.paths(datasetId)

    if (!options.refresh && (await this.isFresh(datasetId, options))) {
      this.logger.debug("bulk file fresh", { datasetId, path })
      return path
    }

    // A refresh is satisfied by any download that finishes after this point.
    const seenDownload = options.refresh ? ((await this.manifest(datasetId))?.downloadId ?? null) : null

    return await withLock(
      this.deps.lock,
      lockPath,
      async () => {
        if (await this.isFresh(datasetId, options, seenDownload)) {
          this.logger.debug("bulk file refreshed by another caller", { datasetId, path })
          return path
        }

        await this.download(datasetId, options, fetchFn)
        return path
      },
      {
        ttl: { milliseconds: this.opts.lockTtlMs },
        timeoutMs: this.opts.lockTimeoutMs,
        renewal: {
          everyMs: Math.max(1, Math.floor(this.opts.lockTtlMs / 3)),
          onFailure: (err) => this.logger.warn("bulk lock renewal failed", { datasetId, path, err }),
        },
      },
    )
  }

  /**
   * `ensure()` followed by decoding the file. A file that fails to decode is
   * deleted and downloaded once more.
   *
   * @throws {CorruptEntryError} when the fresh download does not decode either.
   */
  async read(datasetId: DatasetId, options: EnsureOptions, fetchFn: FetchFn<T>): Promise<T> {
    const path = await this.ensure(datasetId, options, fetchFn)

    const first = await this.decode(path)
    if (first.ok) return first.value

    this.logger.warn("bulk file corrupt, downloading again", { datasetId, path, err: first.error })
    await this.removeData(datasetId)

    const second = await this.decode(await this.ensure(datasetId, { ...options, refresh: false }, fetchFn))
    if (second.ok) return second.value

    throw second.error
  }

  async head(datasetId: DatasetId): Promise<BulkFileRecord | null> {
    return (await this.inspect(datasetId))?.record ?? null
  }

  async manifest(datasetId: DatasetId): Promise<BulkManifest | null> {
    return await readManifest(this.paths(datasetId).manifestPath)
  }

  /**
   * Remove the dataset's file, its manifest and its lock file.
   *
   * @returns Whether a data file was there.
   */
  async clear(datasetId: DatasetId): Promise<boolean> {
    const { lockPath } = this.paths(datasetId)

    const removed = await this.removeData(datasetId)
    await removeFile(lockPath)

    this.logger.info("bulk dataset cleared", { datasetId, removed })

    return removed
  }

  async clearAll(): Promise<ClearReport> {
    const report = await clearDirectory(this.directory, "bulk")

    this.logger.info("bulk tier cleared", {
      removed: report.removed,
      failed: report.failures.length,
    })

    return report
  }

  async listRecords(): Promise<BulkFileRecord[]> {
    return (await this.inspectAll()).map((i) => i.record)
  }

  async stats(): Promise<BulkStats> {
    const all = await this.inspectAll()
    const times = all.map((i) => i.record.lastModified.getTime())

    return {
      datasets: all.length,
      totalBytes: all.reduce((sum, i) => sum + i.sizeInBytes, 0),
      oldest: times.length > 0 ? new Date(Math.min(...times)) : null,
      newest: times.length > 0 ? new Date(Math.max(...times)) : null,
    }
  }

  /**
   * @param supersededDownload When given (a refresh), the file only counts as
   *   fresh if a download other than this one has replaced it since.
   */
  private async isFresh(
    datasetId: DatasetId,
    options: EnsureOptions,
    supersededDownload?: string | null,
  ): Promise<boolean> {
    const record = await this.head(datasetId)
    if (!record) return false

    const modifiedAt = record.lastModified.getTime()
    const freshnessMs = options.freshnessMs ?? this.opts.freshnessMs

    if (this.deps.clock.nowMs() - modifiedAt > freshnessMs) return false
    if (options.version === undefined && supersededDownload === undefined) return true

    const manifest = await this.manifest(datasetId)

    if (options.version !== undefined && manifest?.version !== options.version) return false
    if (supersededDownload !== undefined) {
      return manifest !== null && manifest.downloadId !== supersededDownload
    }

    return true
  }

  private async download(
    datasetId: DatasetId,
    options: EnsureOptions,
    fetchFn: FetchFn<T>,
  ): Promise<void> {
    const { path, manifestPath } = this.paths(datasetId)

    this.logger.info("downloading bulk file", { datasetId, path })

    const data = await fetchFn(datasetId)
    const bytes = this.deps.serializer.encode(data)

    await writeFileAtomic(path, bytes)

    const now = this.deps.clock.now()

    try {
      await utimes(path, now, now)
    } catch (err) {
      throw new StorageError(path, "utimes", err)
    }

    await writeFileAtomic(
      manifestPath,
      encodeManifest({
        datasetId,
        downloadId: randomUUID(),
        version: options.version ?? null,
        downloadedAt: now.toISOString(),
        sizeInBytes: bytes.byteLength,
      }),
    )

    this.logger.info("bulk file downloaded", { datasetId, path, sizeInBytes: bytes.byteLength })
  }

  private async decode(path: string): Promise<Decoded<T>> {
    try {
      return { ok: true, value: this.deps.serializer.decode(await readFile(path)) }
    } catch (err) {
      return { ok: false, error: new CorruptEntryError(path, err) }
    }
  }

  private async removeData(datasetId: DatasetId): Promise<boolean> {
    const { path, manifestPath } = this.paths(datasetId)

    const removed = await removeFile(path)
    await removeFile(manifestPath)

    return removed
  }

  private async inspect(datasetId: DatasetId): Promise<Inspected | null> {
    const { path, lockPath } = this.paths(datasetId)

    try {
      const stats = await stat(path)

      return {
        record: { datasetId, path, lastModified: stats.mtime, lockPath },
        sizeInBytes: stats.size,
      }
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  private async inspectAll(): Promise<Inspected[]> {
    const suffix = `.${this.deps.serializer.format}`
    const out: Inspected[] = []

    for (const name of await listFiles(this.directory)) {
      if (!name.endsWith(suffix) || name.endsWith(MANIFEST_SUFFIX) || isTempFile(name)) continue

      const datasetId = name.slice(0, -suffix.length)
      if (!isDatasetId(datasetId)) continue

      const inspected = await this.inspect(datasetId)
      if (inspected) out.push(inspected)
    }

    return out
  }
}

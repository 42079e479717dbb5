import { link, mkdir, rename, rm, writeFile } from "node:fs/promises"
import { hostname } from "node:os"
import { dirname, resolve } from "node:path"

import type { Clock, Milliseconds } from "@tiercache/clock"
import { isAlreadyExists, isNotFound } from "@tiercache/errors"

import type { PollOptions, PollUntilFn } from "../../core/polling/poll-until"
import { assertPositiveMs, assertValidTimeMs } from "../../core/validation/validation"
import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { AcquireOptions, LockConfig, LockTtl, TryAcquireOptions } from "../../ports/options"
import { FileLease } from "./file-lock-lease"
import { type LockFileState, type LockRecord, readLockFile, sameHolder } from "./lock-file"
import { isProcessAlive } from "./process-alive"

export type FileLockDeps = {
  clock: Clock
  generateToken: () => string
  pollUntil: PollUntilFn

  /** @default {@link isProcessAlive} */
  isProcessAlive?: (pid: number) => boolean
}

export type FileLockConfig = LockConfig & {
  /**
   * How long a lock file without a readable record is respected before it is
   * treated as abandoned.
   *
   * @default 10_000
   */
  unreadableGraceMs?: Milliseconds
}

const DEFAULT_UNREADABLE_GRACE_MS = 10_000

/**
 * Advisory lock backed by a file created with `O_EXCL`.
 *
 * The key is the path of the lock file. Any process that can see the file
 * system (and agrees on the path) is excluded, not only callers sharing this
 * instance. A lock file is reclaimed once its record expires, or earlier when
 * the holder was a process on this host that is no longer running.
 *
 * @remarks
 * Reclaiming is best effort. The abandoned file is first renamed aside and its
 * token compared with the one that was judged expired, so a holder that
 * replaced it in the meantime is put back instead of deleted.
 */
export class FileLock implements Lock {
  private readonly unreadableGraceMs: Milliseconds
  private readonly isProcessAlive: (pid: number) => boolean

  public constructor(
    private readonly deps: FileLockDeps,
    private readonly config: FileLockConfig,
  ) {
    this.unreadableGraceMs = config.unreadableGraceMs ?? DEFAULT_UNREADABLE_GRACE_MS
    this.isProcessAlive = deps.isProcessAlive ?? isProcessAlive
    assertValidTimeMs(this.unreadableGraceMs, "FileLockConfig.unreadableGraceMs")
  }

  public async acquire(key: LockKey, opts: AcquireOptions): Promise<LockLease | null> {
    if (opts.signal?.aborted) return null

    const timeoutMs = opts.timeoutMs ?? this.config.defaultTimeoutMs

    assertValidTimeMs(timeoutMs, "AcquireOptions.timeoutMs")

    if (timeoutMs === 0) return await this.tryAcquire(key, { ttl: opts.ttl })

    const pollOpts: PollOptions = {
      pollMs: this.config.pollMs,
      timeoutMs,
      ...(opts.signal && { signal: opts.signal }),
    }

    const acquired = await this.deps.pollUntil(
      () => this.tryAcquire(key, { ttl: opts.ttl }),
      { clock: this.deps.clock },
      pollOpts,
    )

    return acquired.ok ? acquired.value : null
  }

  public async tryAcquire(key: LockKey, opts: TryAcquireOptions): Promise<LockLease | null> {
    assertPositiveMs(opts.ttl.milliseconds, `ttl for lock ${key}`)

    const path = resolve(key)

    const lease = await this.create(path, opts.ttl)
    if (lease) return lease

    if (!(await this.reclaimIfAbandoned(path))) return null

    return await this.create(path, opts.ttl)
  }

  private async create(path: string, ttl: LockTtl): Promise<FileLease | null> {
    const token = this.deps.generateToken()
    const now = this.deps.clock.nowMs()

    const record: LockRecord = {
      token,
      pid: process.pid,
      hostname: hostname(),
      acquiredAt: now,
      expiresAt: now + ttl.milliseconds,
    }

    await mkdir(dirname(path), { recursive: true })

    try {
      await writeFile(path, JSON.stringify(record), { flag: "wx" })
    } catch (err) {
      if (isAlreadyExists(err)) return null
      throw err
    }

    return new FileLease(path, { clock: this.deps.clock, token })
  }

  private async reclaimIfAbandoned(path: string): Promise<boolean> {
    const observed = await readLockFile(path)

    if (observed.kind === "missing") return true
    if (!this.isAbandoned(observed)) return false

    const parked = `${path}.reclaim-${this.deps.generateToken()}`

    try {
      await rename(path, parked)
    } catch (err) {
      if (isNotFound(err)) return true
      throw err
    }

    try {
      if (sameHolder(observed, await readLockFile(parked))) return true

      await this.restore(parked, path)
      return false
    } finally {
      await rm(parked, { force: true })
    }
  }

  private async restore(parked: string, path: string): Promise<void> {
    try {
      await link(parked, path)
    } catch (err) {
      // A third caller already holds a fresh lock at `path`.
      if (!isAlreadyExists(err)) throw err
    }
  }

  private isAbandoned(state: Exclude<LockFileState, { kind: "missing" }>): boolean {
    const now = this.deps.clock.nowMs()

    if (state.kind === "held") {
      if (state.record.expiresAt <= now) return true

      // Processes on other hosts cannot be checked from here.
      return state.record.hostname === hostname() && !this.isProcessAlive(state.record.pid)
    }

    return now - state.modifiedAtMs > this.unreadableGraceMs
  }
}

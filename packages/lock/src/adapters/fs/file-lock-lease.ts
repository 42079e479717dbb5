import { rename, rm, writeFile } from "node:fs/promises"

import type { Clock } from "@tiercache/clock"

import { assertPositiveMs } from "../../core/validation/validation"
import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { LockTtl } from "../../ports/options"
import { type LockRecord, readLockFile } from "./lock-file"

type FileLeaseDeps = {
  clock: Clock
  token: string
}

export class FileLease implements LockLease {
  public readonly key: LockKey

  private released = false

  public constructor(
    key: LockKey,
    private readonly deps: FileLeaseDeps,
  ) {
    this.key = key
  }

  public async release(): Promise<void> {
    if (this.released) return

    this.released = true

    // A lease that expired may have been reclaimed; never delete the new holder's file.
    if (await this.ownedRecord()) {
      await rm(this.key, { force: true })
    }
  }

  public async extend(ttl: LockTtl): Promise<boolean> {
    if (this.released) return false

    assertPositiveMs(ttl.milliseconds, `ttl for lock ${this.key}`)

    const current = await this.ownedRecord()
    if (!current) return false

    const next: LockRecord = {
      ...current,
      expiresAt: this.deps.clock.nowMs() + ttl.milliseconds,
    }

    const tmp = `${this.key}.extend-${this.deps.token}`
    await writeFile(tmp, JSON.stringify(next))
    await rename(tmp, this.key)

    return true
  }

  private async ownedRecord(): Promise<LockRecord | null> {
    const state = await readLockFile(this.key)

    if (state.kind !== "held" || state.record.token !== this.deps.token) return null

    return state.record
  }
}

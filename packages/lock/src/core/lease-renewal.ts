import type { Milliseconds } from "@tiercache/clock"

import type { LockLease } from "../ports/lock-lease"
import type { LockTtl } from "../ports/options"
import { LockLostError } from "./errors"
import { assertPositiveMs } from "./validation/validation"

export type RenewalOptions = {
  /** Interval between renewals. Keep it well below the ttl. */
  everyMs: Milliseconds

  /** Gets a {@link LockLostError}, or whatever `extend()` threw. */
  onFailure: (err: unknown) => void
}

/**
 * Extends a lease by `ttl` every `everyMs` until stopped, so that work
 * outliving the ttl keeps the lock. Renewals never overlap.
 */
export class LeaseRenewal {
  private readonly timer: ReturnType<typeof setInterval>
  private pending: Promise<void> | null = null
  private stopped = false

  public constructor(
    private readonly lease: LockLease,
    private readonly ttl: LockTtl,
    private readonly opts: RenewalOptions,
  ) {
    assertPositiveMs(opts.everyMs, "RenewalOptions.everyMs")

    this.timer = setInterval(() => this.tick(), opts.everyMs)
    this.timer.unref()
  }

  /** Stops renewing and waits for a renewal already underway. */
  public async stop(): Promise<void> {
    this.stopped = true
    clearInterval(this.timer)

    await this.pending
  }

  private tick(): void {
    if (this.stopped || this.pending) return

    this.pending = this.renew().finally(() => {
      this.pending = null
    })
  }

  private async renew(): Promise<void> {
    try {
      if (!(await this.lease.extend(this.ttl))) {
        this.opts.onFailure(new LockLostError(this.lease.key))
      }
    } catch (err) {
      this.opts.onFailure(err)
    }
  }
}

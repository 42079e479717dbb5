import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Manually driven clock.
 *
 * `sleep()` resolves on the next microtask and moves time forward by the
 * requested amount, so polling loops built on a FakeClock reach their
 * deadlines without real waiting.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private readonly slept: Milliseconds[] = []

  constructor(start: Milliseconds | Date = 0) {
    this.time = start instanceof Date ? start.getTime() : start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }

  /** Durations passed to `sleep()`, in call order. */
  get sleeps(): readonly Milliseconds[] {
    return this.slept
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.slept.push(ms)
    this.advance(Math.max(0, ms))
  }
}

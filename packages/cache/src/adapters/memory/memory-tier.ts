import type { Clock } from "@tiercache/clock"
import type { Logger } from "@tiercache/logger"

import type { CacheKey } from "../../ports/cache-key"
import type { ClearReport, TierName } from "../../ports/clear-report"
import type { ReadTier } from "../../ports/tier"
import type { TierResult } from "../../ports/tier-result"

export type MemoryTierDeps = {
  clock: Clock
  logger: Logger
}

export type MemoryEntry<T> = {
  key: CacheKey
  value: T
  createdAt: Date
}

/**
 * In-process map with no eviction; entries live as long as the process.
 *
 * Each method reads and mutates the map without awaiting in between, so
 * concurrent callers in one process see the operations in a single order.
 */
export class MemoryTier<T> implements ReadTier<T> {
  public readonly name: TierName = "memory"

  private readonly entries = new Map<CacheKey, MemoryEntry<T>>()
  private readonly logger: Logger

  public constructor(private readonly deps: MemoryTierDeps) {
    this.logger = deps.logger.child({ module: "memory-tier" })
  }

  async get(key: CacheKey): Promise<TierResult<T>> {
    const entry = this.entries.get(key)

    if (entry === undefined) return { kind: "miss" }

    return { kind: "hit", value: entry.value }
  }

  async set(key: CacheKey, value: T): Promise<void> {
    this.entries.set(key, { key, value, createdAt: this.deps.clock.now() })
  }

  async invalidate(key: CacheKey): Promise<void> {
    this.entries.delete(key)
  }

  async clear(): Promise<ClearReport> {
    const removed = this.entries.size
    this.entries.clear()

    this.logger.info("memory tier cleared", { removed })

    return { removed, failures: [] }
  }

  /** Entry metadata, or `undefined` when absent. */
  entry(key: CacheKey): MemoryEntry<T> | undefined {
    return this.entries.get(key)
  }

  get size(): number {
    return this.entries.size
  }
}

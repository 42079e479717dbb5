import { serializeError, toAppError } from "@tiercache/errors"
import type { Logger } from "@tiercache/logger"

import type { BulkTier } from "../../adapters/fs/bulk-tier"
import type { CacheKey, DatasetId } from "../../ports/cache-key"
import type { ClearFailure, ClearReport, TierName } from "../../ports/clear-report"
import type { FetchFn } from "../../ports/fetcher"
import type { ReadTier } from "../../ports/tier"
import type { CacheState } from "../state/cache-state"

export type CacheControllerDeps<T> = {
  state: CacheState
  /** Fastest first. */
  tiers: readonly ReadTier<T>[]
  bulk: BulkTier<T>
  logger: Logger
}

/**
 * Orchestrates the tiers: read through them in order, promote hits upward,
 * compute misses once and store them on the way back.
 */
export class CacheController<T> {
  private readonly logger: Logger

  public constructor(private readonly deps: CacheControllerDeps<T>) {
    this.logger = deps.logger.child({ module: "controller" })
  }

  enable(): void {
    this.deps.state.enable()
    this.logger.info("cache enabled")
  }

  disable(): void {
    this.deps.state.disable()
    this.logger.info("cache disabled")
  }

  isEnabled(): boolean {
    return this.deps.state.isEnabled()
  }

  /**
   * The value for `key`, from the fastest tier that has it or from
   * `fetchFn`. While disabled no tier is read or written.
   *
   * @throws whatever `fetchFn` throws, and {@link StorageError} when a
   *   computed value cannot be stored.
   */
  async resolve(key: CacheKey, datasetId: DatasetId, fetchFn: FetchFn<T>): Promise<T> {
    if (!this.isEnabled()) return await fetchFn(datasetId)

    const tiers = this.deps.tiers

    for (const [index, tier] of tiers.entries()) {
      const result = await tier.get(key)

      if (result.kind === "hit") {
        for (const faster of tiers.slice(0, index)) {
          await faster.set(key, result.value)
        }

        this.logger.debug("cache hit", { key, datasetId, tier: tier.name })
        return result.value
      }

      if (result.kind === "corrupt") {
        this.logger.warn("corrupt cache entry discarded", {
          key,
          datasetId,
          tier: tier.name,
          err: result.error,
        })
      }
    }

    this.logger.debug("cache miss", { key, datasetId })

    const value = await fetchFn(datasetId)

    for (const tier of [...tiers].reverse()) {
      await tier.set(key, value)
    }

    return value
  }

  /** Drop `key` from every read tier. */
  async invalidate(key: CacheKey): Promise<void> {
    for (const tier of this.deps.tiers) {
      await tier.invalidate(key)
    }
  }

  /**
   * Clear every tier. A tier that fails does not stop the others; its
   * failure ends up in the report.
   */
  async clearAll(): Promise<ClearReport> {
    const steps: [TierName, () => Promise<ClearReport>][] = [
      ...this.deps.tiers.map((tier): [TierName, () => Promise<ClearReport>] => [
        tier.name,
        () => tier.clear(),
      ]),
      ["bulk", () => this.deps.bulk.clearAll()],
    ]

    const failures: ClearFailure[] = []
    let removed = 0

    for (const [tier, clear] of steps) {
      try {
        const report = await clear()
        removed += report.removed
        failures.push(...report.failures)
      } catch (err) {
        failures.push({ tier, error: serializeError(toAppError(err)) })
      }
    }

    if (failures.length > 0) {
      this.logger.warn("cache cleared with failures", { removed, failures })
    } else {
      this.logger.info("cache cleared", { removed })
    }

    return { removed, failures }
  }
}

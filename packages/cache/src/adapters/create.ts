import { randomUUID } from "node:crypto"

import { type Clock, type Milliseconds, SystemClock } from "@tiercache/clock"
import type { ConfigSource } from "@tiercache/config"
import { FileLock, type Lock, pollUntil } from "@tiercache/lock"
import { createNullLogger, createPinoLogger, type Logger } from "@tiercache/logger"

import {
  DEFAULT_BULK_FRESHNESS_MS,
  DEFAULT_LOCK_POLL_MS,
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_LOCK_TTL_MS,
  loadCacheConfig,
} from "../core/config/cache-config"
import { CacheController } from "../core/controller/cache-controller"
import { DatasetReader } from "../core/reader/dataset-reader"
import { type CacheState, getCacheState } from "../core/state/cache-state"
import type { CacheKey, DatasetId } from "../ports/cache-key"
import type { ClearReport } from "../ports/clear-report"
import type { FetchFn } from "../ports/fetcher"
import type { Serializer } from "../ports/serializer"
import { BulkTier } from "./fs/bulk-tier"
import { QueryTier } from "./fs/query-tier"
import { MemoryTier } from "./memory/memory-tier"

export interface Cache<T> {
  readonly state: CacheState
  readonly memory: MemoryTier<T>
  readonly query: QueryTier<T>
  readonly bulk: BulkTier<T>
  readonly controller: CacheController<T>
  readonly reader: DatasetReader<T>

  configure(baseDirectory: string): void
  enable(): void
  disable(): void
  isEnabled(): boolean
  clearAll(): Promise<ClearReport>
  resolve(key: CacheKey, datasetId: DatasetId, fetchFn: FetchFn<T>): Promise<T>
}

export interface CreateCacheOptions<T> {
  serializer: Serializer<T>

  /** Configures the state when given. */
  baseDirectory?: string

  /** Sets the state's initial switch when given. */
  enabled?: boolean

  /** Defaults to the process-wide state. */
  state?: CacheState
  clock?: Clock
  logger?: Logger

  /** Defaults to a lock file next to each bulk file. */
  lock?: Lock

  bulkFreshnessMs?: Milliseconds
  lockTimeoutMs?: Milliseconds
  lockPollMs?: Milliseconds
  lockTtlMs?: Milliseconds
  queryTtlMs?: Milliseconds
}

export function createCache<T>(options: CreateCacheOptions<T>): Cache<T> {
  const state = options.state ?? getCacheState()
  const clock = options.clock ?? new SystemClock()
  const logger = options.logger ?? createNullLogger()
  const lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS

  if (options.baseDirectory !== undefined) state.configure(options.baseDirectory)
  if (options.enabled === true) state.enable()
  if (options.enabled === false) state.disable()

  const lock =
    options.lock ??
    new FileLock(
      { clock, generateToken: randomUUID, pollUntil },
      { defaultTimeoutMs: lockTimeoutMs, pollMs: options.lockPollMs ?? DEFAULT_LOCK_POLL_MS },
    )

  const memory = new MemoryTier<T>({ clock, logger })
  const query = new QueryTier<T>(
    { state, serializer: options.serializer, clock, logger },
    options.queryTtlMs !== undefined ? { ttlMs: options.queryTtlMs } : {},
  )
  const bulk = new BulkTier<T>(
    { state, serializer: options.serializer, clock, lock, logger },
    {
      freshnessMs: options.bulkFreshnessMs ?? DEFAULT_BULK_FRESHNESS_MS,
      lockTimeoutMs,
      lockTtlMs: options.lockTtlMs ?? DEFAULT_LOCK_TTL_MS,
    },
  )

  const controller = new CacheController<T>({ state, tiers: [memory, query], bulk, logger })
  const reader = new DatasetReader<T>({ controller, bulk })

  return {
    state,
    memory,
    query,
    bulk,
    controller,
    reader,
    configure: (baseDirectory) => state.configure(baseDirectory),
    enable: () => controller.enable(),
    disable: () => controller.disable(),
    isEnabled: () => controller.isEnabled(),
    clearAll: () => controller.clearAll(),
    resolve: (key, datasetId, fetchFn) => controller.resolve(key, datasetId, fetchFn),
  }
}

export type CreateCacheFromConfigOptions = {
  /** Defaults to `.env` then the environment, both `TIERCACHE_`-prefixed. */
  sources?: readonly ConfigSource[]
  state?: CacheState
  clock?: Clock
  /** Defaults to a pino logger at the configured level. */
  logger?: Logger
}

export async function createCacheFromConfig<T>(
  serializer: Serializer<T>,
  options: CreateCacheFromConfigOptions = {},
): Promise<Cache<T>> {
  const config = (await loadCacheConfig(options.sources)).value
  const logger =
    options.logger ?? createPinoLogger({ level: config.LOG_LEVEL }).child({ service: "tiercache" })

  logger.debug("cache configuration loaded", { path: config.CACHE_DIR })

  return createCache({
    serializer,
    baseDirectory: config.CACHE_DIR,
    enabled: config.CACHE_ENABLED,
    logger,
    bulkFreshnessMs: config.BULK_FRESHNESS_MS,
    lockTimeoutMs: config.LOCK_TIMEOUT_MS,
    lockPollMs: config.LOCK_POLL_MS,
    lockTtlMs: config.LOCK_TTL_MS,
    ...(config.QUERY_TTL_MS !== undefined && { queryTtlMs: config.QUERY_TTL_MS }),
    ...(options.state && { state: options.state }),
    ...(options.clock && { clock: options.clock }),
  })
}

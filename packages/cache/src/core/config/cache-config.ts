import { type ConfigSource, DotenvSource, EnvSource, type IConfig, loadConfig } from "@tiercache/config"
import { logLevelNames } from "@tiercache/logger"
import { z } from "zod"

export const CONFIG_PREFIX = "TIERCACHE_"

export const DEFAULT_BULK_FRESHNESS_MS = 30 * 24 * 60 * 60 * 1000
export const DEFAULT_LOCK_TIMEOUT_MS = 20 * 60 * 1000
export const DEFAULT_LOCK_POLL_MS = 100
export const DEFAULT_LOCK_TTL_MS = 5 * 60 * 1000

const ms = () => z.coerce.number().int().nonnegative()

export const cacheConfigSchema = z.object({
  CACHE_DIR: z.string().min(1),
  CACHE_ENABLED: z.union([z.boolean(), z.stringbool()]).default(true),
  BULK_FRESHNESS_MS: ms().default(DEFAULT_BULK_FRESHNESS_MS),
  LOCK_TIMEOUT_MS: ms().default(DEFAULT_LOCK_TIMEOUT_MS),
  LOCK_POLL_MS: ms().positive().default(DEFAULT_LOCK_POLL_MS),
  LOCK_TTL_MS: ms().positive().default(DEFAULT_LOCK_TTL_MS),
  QUERY_TTL_MS: ms().positive().optional(),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
})

export type CacheConfig = z.infer<typeof cacheConfigSchema>

/** `.env` in the working directory, then the process environment; both `TIERCACHE_`-prefixed. */
export function defaultConfigSources(): ConfigSource[] {
  return [
    new DotenvSource({ file: ".env", required: false, prefix: CONFIG_PREFIX }),
    new EnvSource({ prefix: CONFIG_PREFIX }),
  ]
}

export async function loadCacheConfig(
  sources: readonly ConfigSource[] = defaultConfigSources(),
): Promise<IConfig<CacheConfig>> {
  return await loadConfig({ schema: cacheConfigSchema, sources })
}

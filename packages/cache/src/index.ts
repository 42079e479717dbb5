export { BulkTier, type BulkTierDeps, type BulkTierOptions } from "./adapters/fs/bulk-tier"
export { QueryTier, type QueryTierDeps, type QueryTierOptions } from "./adapters/fs/query-tier"
export { MemoryTier, type MemoryEntry, type MemoryTierDeps } from "./adapters/memory/memory-tier"
export { createJsonSerializer, JsonSerializer } from "./adapters/serializers/json-serializer"
export {
  type Cell,
  filterTable,
  type Table,
  TableSerializer,
  tableSchema,
} from "./adapters/serializers/table-serializer"
export {
  type Cache,
  createCache,
  createCacheFromConfig,
  type CreateCacheFromConfigOptions,
  type CreateCacheOptions,
} from "./adapters/create"
export {
  type CacheConfig,
  cacheConfigSchema,
  defaultConfigSources,
  loadCacheConfig,
} from "./core/config/cache-config"
export { CacheController, type CacheControllerDeps } from "./core/controller/cache-controller"
export {
  CacheNotConfiguredError,
  CorruptEntryError,
  InvalidDatasetIdError,
  KeyConstructionError,
  StorageError,
} from "./core/errors"
export { buildCacheKey, canonicalParams } from "./core/key/cache-key"
export { isDatasetId } from "./core/key/dataset-id"
export { createQueryDescriptor, queryKey } from "./core/key/query-descriptor"
export { type BulkReadOptions, DatasetReader } from "./core/reader/dataset-reader"
export { CacheState, getCacheState, resetCacheState } from "./core/state/cache-state"
export type { BulkFileRecord, BulkManifest, BulkStats, EnsureOptions } from "./ports/bulk"
export type { CacheKey, DatasetId, KeyParams, KeyParamValue } from "./ports/cache-key"
export type { ClearFailure, ClearReport, TierName } from "./ports/clear-report"
export type { Fetcher, FetchFn } from "./ports/fetcher"
export type { QueryDescriptor, QueryDescriptorInput } from "./ports/query-descriptor"
export type { Serializer } from "./ports/serializer"
export type { ReadTier } from "./ports/tier"
export type { TierResult } from "./ports/tier-result"

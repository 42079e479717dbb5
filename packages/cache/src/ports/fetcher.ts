import type { DatasetId } from "./cache-key"
import type { QueryDescriptor } from "./query-descriptor"

/**
 * Computes a value on a cache miss. Errors are propagated to the caller
 * untouched; retrying and rate limiting are the fetcher's own business.
 */
export type FetchFn<T> = (datasetId: DatasetId) => Promise<T>

export interface Fetcher<T> {
  fetch(datasetId: DatasetId, query: QueryDescriptor): Promise<T>
}

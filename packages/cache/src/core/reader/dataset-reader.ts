import type { BulkTier } from "../../adapters/fs/bulk-tier"
import type { EnsureOptions } from "../../ports/bulk"
import type { Fetcher, FetchFn } from "../../ports/fetcher"
import type { QueryDescriptor } from "../../ports/query-descriptor"
import type { CacheController } from "../controller/cache-controller"
import { queryKey } from "../key/query-descriptor"

export type BulkReadOptions<T> = EnsureOptions & {
  /** Downloads the whole dataset. */
  fetchBulk: FetchFn<T>

  /** Narrows the whole dataset down to `query`. */
  filter: (data: T, query: QueryDescriptor) => T | Promise<T>
}

export type DatasetReaderDeps<T> = {
  controller: CacheController<T>
  bulk: BulkTier<T>
}

/**
 * Entry point for data sources: answers a query from the cache, computing it
 * on a miss either from a per-query fetcher or from the dataset's bulk file.
 */
export class DatasetReader<T> {
  public constructor(private readonly deps: DatasetReaderDeps<T>) {}

  async read(query: QueryDescriptor, fetcher: Fetcher<T>): Promise<T> {
    return await this.deps.controller.resolve(queryKey(query), query.dataset, (datasetId) =>
      fetcher.fetch(datasetId, query),
    )
  }

  async readFromBulk(query: QueryDescriptor, options: BulkReadOptions<T>): Promise<T> {
    const { fetchBulk, filter, ...ensure } = options

    if (!this.deps.controller.isEnabled()) {
      return await filter(await fetchBulk(query.dataset), query)
    }

    return await this.deps.controller.resolve(queryKey(query), query.dataset, async (datasetId) =>
      filter(await this.deps.bulk.read(datasetId, ensure, fetchBulk), query),
    )
  }
}

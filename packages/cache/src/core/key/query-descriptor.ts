import type { CacheKey, KeyParams } from "../../ports/cache-key"
import type { QueryDescriptor, QueryDescriptorInput } from "../../ports/query-descriptor"
import { buildCacheKey, canonicalCollection, canonicalNumbers, canonicalStrings } from "./cache-key"
import { assertDatasetId } from "./dataset-id"

/**
 * Freeze a query into its canonical form. Filter lists come back sorted and
 * deduplicated, missing scalars as `null`, missing lists as `[]`.
 */
export function createQueryDescriptor(input: QueryDescriptorInput): QueryDescriptor {
  assertDatasetId(input.dataset)

  return Object.freeze({
    dataset: input.dataset,
    measure: input.measure ?? null,
    currency: input.currency ?? null,
    baseYear: input.baseYear ?? null,
    years: Object.freeze(canonicalNumbers("years", input.years ?? [])),
    providers: mixedList("providers", input.providers),
    recipients: mixedList("recipients", input.recipients),
    indicators: Object.freeze(canonicalStrings(input.indicators ?? [])),
    sectors: mixedList("sectors", input.sectors),
  })
}

export function queryParams(query: QueryDescriptor): KeyParams {
  return {
    measure: query.measure,
    currency: query.currency,
    baseYear: query.baseYear,
    years: query.years,
    providers: query.providers,
    recipients: query.recipients,
    indicators: query.indicators,
    sectors: query.sectors,
  }
}

export function queryKey(query: QueryDescriptor): CacheKey {
  return buildCacheKey(query.dataset, queryParams(query))
}

function mixedList(
  name: string,
  items: Iterable<string | number> | null | undefined,
): readonly (string | number)[] {
  return Object.freeze([...(canonicalCollection(name, [...(items ?? [])]) ?? [])])
}

import type { DatasetId } from "./cache-key"

export type QueryDescriptor = Readonly<{
  dataset: DatasetId
  measure: string | null
  currency: string | null
  baseYear: number | null
  years: readonly number[]
  providers: readonly (string | number)[]
  recipients: readonly (string | number)[]
  indicators: readonly string[]
  sectors: readonly (string | number)[]
}>

export type QueryDescriptorInput = {
  dataset: DatasetId
  measure?: string | null
  currency?: string | null
  baseYear?: number | null
  years?: Iterable<number> | null
  providers?: Iterable<string | number> | null
  recipients?: Iterable<string | number> | null
  indicators?: Iterable<string> | null
  sectors?: Iterable<string | number> | null
}

import { createHash } from "node:crypto"

import type { CacheKey, DatasetId, KeyParams, KeyScalar } from "../../ports/cache-key"
import { KeyConstructionError } from "../errors"
import { assertDatasetId } from "./dataset-id"

type CanonicalValue = KeyScalar | readonly string[] | readonly number[]

export type CanonicalParams = ReadonlyArray<readonly [string, CanonicalValue]>

/**
 * Fingerprint a dataset query.
 *
 * Parameters that are set-equal produce the same key: collections are
 * sorted and deduplicated, and `null`, `undefined`, omitted and empty
 * collections all mean "not given".
 *
 * @throws {KeyConstructionError} on NaN or infinite numbers, collections
 *   mixing strings and numbers, or values that are neither scalars nor
 *   collections.
 */
export function buildCacheKey(datasetId: DatasetId, params: KeyParams): CacheKey {
  assertDatasetId(datasetId)

  const payload = JSON.stringify([datasetId, canonicalParams(params)])

  return createHash("sha256").update(payload).digest("hex")
}

/** Normalized `[name, value]` pairs in name order; absent values removed. */
export function canonicalParams(params: KeyParams): CanonicalParams {
  const out: (readonly [string, CanonicalValue])[] = []

  for (const name of Object.keys(params).sort()) {
    const value = canonicalValue(name, params[name])
    if (value !== undefined) out.push([name, value])
  }

  return out
}

export function canonicalCollection(
  name: string,
  items: readonly unknown[],
): readonly string[] | readonly number[] | undefined {
  if (items.length === 0) return undefined

  if (items.every((item): item is string => typeof item === "string")) {
    return canonicalStrings(items)
  }

  if (items.every((item): item is number => typeof item === "number")) {
    return canonicalNumbers(name, items)
  }

  throw new KeyConstructionError(`Parameter "${name}" must hold only strings or only numbers`, {
    param: name,
    types: [...new Set(items.map(describeType))].sort(),
  })
}

export function canonicalStrings(items: Iterable<string>): string[] {
  return [...new Set(items)].sort()
}

export function canonicalNumbers(name: string, items: Iterable<number>): number[] {
  const unique = new Set<number>()

  for (const item of items) {
    unique.add(finiteNumber(name, item))
  }

  return [...unique].sort((a, b) => a - b)
}

function canonicalValue(name: string, value: unknown): CanonicalValue | undefined {
  if (value === null || value === undefined) return undefined

  if (typeof value === "string" || typeof value === "boolean") return value

  if (typeof value === "number") return finiteNumber(name, value)

  if (Array.isArray(value) || value instanceof Set) {
    const items: unknown[] = [...value]
    return canonicalCollection(name, items)
  }

  throw new KeyConstructionError(`Parameter "${name}" has an unsupported value`, {
    param: name,
    type: describeType(value),
  })
}

function finiteNumber(name: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new KeyConstructionError(`Parameter "${name}" is not a finite number`, {
      param: name,
      value: String(value),
    })
  }

  // -0 and 0 serialize identically; keep them one value in sets too.
  return value === 0 ? 0 : value
}

function describeType(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}

import type { DatasetId } from "../../ports/cache-key"
import { InvalidDatasetIdError } from "../errors"

const FILE_STEM = /^[A-Za-z0-9][A-Za-z0-9._-]*$/

/**
 * No dots: a dataset's files are `<id>.<format>`, `<id>.lock` and
 * `<id>.meta.json`, and a dotted id could name another dataset's sidecar.
 */
const DATASET_ID = /^[A-Za-z0-9][A-Za-z0-9_-]*$/

/** Usable as a file name without escaping and without leaving its directory. */
export function isSafeFileStem(value: string): boolean {
  return FILE_STEM.test(value) && !value.includes("..")
}

export function isDatasetId(value: string): value is DatasetId {
  return DATASET_ID.test(value)
}

export function assertDatasetId(value: string): asserts value is DatasetId {
  if (!isDatasetId(value)) throw new InvalidDatasetIdError(value)
}

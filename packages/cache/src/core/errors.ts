import { BaseError, type ErrorContext, serializeError } from "@tiercache/errors"

export class KeyConstructionError extends BaseError<"key_construction_failed"> {
  constructor(message: string, context: ErrorContext) {
    super(message, { code: "key_construction_failed", context })
  }
}

export class InvalidDatasetIdError extends BaseError<"invalid_dataset_id"> {
  constructor(datasetId: string) {
    super(`Invalid dataset id: ${JSON.stringify(datasetId)}`, {
      code: "invalid_dataset_id",
      context: { datasetId },
    })
  }
}

export class CorruptEntryError extends BaseError<"corrupt_entry"> {
  constructor(path: string, cause: unknown) {
    super(`Cached file could not be decoded: ${path}`, {
      code: "corrupt_entry",
      context: { path },
      cause,
    })
  }
}

export type StorageOperation = "write" | "rename" | "utimes" | "mkdir"

export class StorageError extends BaseError<"storage_failed"> {
  /** `cleanupError` is what went wrong removing leftovers after `cause`. */
  constructor(path: string, operation: StorageOperation, cause: unknown, cleanupError?: unknown) {
    super(`Failed to ${operation} ${path}`, {
      code: "storage_failed",
      context: {
        path,
        operation,
        ...(cleanupError !== undefined && { cleanupError: serializeError(cleanupError) }),
      },
      cause,
    })
  }
}

export class CacheNotConfiguredError extends BaseError<"cache_not_configured"> {
  constructor() {
    super("Cache base directory is not configured; call configure() first", {
      code: "cache_not_configured",
    })
  }
}

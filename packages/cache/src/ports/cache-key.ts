/**
 * Fixed-width fingerprint of a dataset query: 64 lowercase hex characters
 * (SHA-256). Build it with `buildCacheKey` or `queryKey`, never by hand.
 */
export type CacheKey = string

/**
 * Identifier of a remote dataset. It becomes part of a file name, so only
 * letters, digits, `.`, `_` and `-` are allowed, and it must start with a
 * letter or digit.
 */
export type DatasetId = string

export type KeyScalar = string | number | boolean

/** Unordered ids. Strings and numbers must not be mixed in one collection. */
export type KeyCollection = readonly (string | number)[] | ReadonlySet<string | number>

/**
 * A parameter value accepted by the key builder. `null`, `undefined` and
 * empty collections are all treated as "not given".
 */
export type KeyParamValue = KeyScalar | KeyCollection | null | undefined

export type KeyParams = Readonly<Record<string, KeyParamValue>>

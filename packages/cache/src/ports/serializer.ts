/**
 * Converts cached payloads to and from their on-disk bytes.
 *
 * @remarks
 * `decode` must throw on input it cannot fully decode. Tiers rely on that to
 * detect corrupt files; returning a default value instead would serve it as
 * a hit.
 */
export interface Serializer<T> {
  /** File extension used for stored entries, without the dot (e.g. `json`). */
  readonly format: string

  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}

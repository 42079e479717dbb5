import { type ZodType, z } from "zod"

import type { Serializer } from "../../ports/serializer"

export type JsonSerializerOptions = {
  /** @default "json" */
  format?: string
}

/**
 * UTF-8 JSON, validated against `schema` on the way back in. Anything that
 * is not valid UTF-8, not JSON, or not shaped like `schema` throws.
 */
export class JsonSerializer<T> implements Serializer<T> {
  readonly format: string

  private readonly encoder = new TextEncoder()
  private readonly decoder = new TextDecoder("utf-8", { fatal: true })

  constructor(
    private readonly schema: ZodType<T>,
    opts: JsonSerializerOptions = {},
  ) {
    this.format = opts.format ?? "json"
  }

  encode(value: T): Uint8Array {
    return this.encoder.encode(JSON.stringify(value))
  }

  decode(bytes: Uint8Array): T {
    const parsed: unknown = JSON.parse(this.decoder.decode(bytes))

    return this.schema.parse(parsed)
  }
}

/** JSON without a shape check. */
export function createJsonSerializer(): JsonSerializer<unknown> {
  return new JsonSerializer(z.unknown())
}

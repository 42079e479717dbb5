import type { ConfigSource } from "../ports/source"

/** In-code values, typically explicit overrides listed last. */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Readonly<Record<string, unknown>>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}

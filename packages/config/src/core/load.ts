import { BaseError } from "@tiercache/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(message: string, issues: readonly string[], sources: readonly string[]) {
    super(message, { code: "config_invalid", context: { issues, sources } })
  }
}

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Applied in order, later sources win. Defaults to the process environment. */
  sources?: readonly ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      result.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
      resolvedSources.map((s) => s.name),
    )
  }

  const used: Record<string, string> = {}
  for (const key of Object.keys(result.data)) {
    const from = provenance[key]
    if (from !== undefined) used[key] = from
  }

  return new Config<T>(result.data, used, new Set(Object.keys(merged)))
}

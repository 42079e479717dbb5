import { resolve } from "node:path"

import { CacheNotConfiguredError } from "../errors"

export type CacheStateOptions = {
  baseDirectory?: string
  /** @default true */
  enabled?: boolean
}

/**
 * Process-wide switchboard read by every tier on every call: whether caching
 * is on, and where files live. Changing the base directory takes effect on
 * the next operation of each tier.
 */
export class CacheState {
  private enabled: boolean
  private base: string | null

  constructor(opts: CacheStateOptions = {}) {
    this.enabled = opts.enabled ?? true
    this.base = opts.baseDirectory !== undefined ? resolve(opts.baseDirectory) : null
  }

  configure(baseDirectory: string): void {
    if (baseDirectory.trim() === "") {
      throw new RangeError("Cache base directory must not be empty")
    }

    this.base = resolve(baseDirectory)
  }

  get isConfigured(): boolean {
    return this.base !== null
  }

  /** @throws {CacheNotConfiguredError} before `configure()`. */
  get baseDirectory(): string {
    if (this.base === null) throw new CacheNotConfiguredError()
    return this.base
  }

  enable(): void {
    this.enabled = true
  }

  disable(): void {
    this.enabled = false
  }

  isEnabled(): boolean {
    return this.enabled
  }

  /** Back to enabled and unconfigured. */
  reset(): void {
    this.enabled = true
    this.base = null
  }
}

let shared: CacheState | undefined

/** The state shared by caches created without an explicit one. */
export function getCacheState(): CacheState {
  shared ??= new CacheState()
  return shared
}

export function resetCacheState(): void {
  shared?.reset()
}

import { FakeClock } from "@tiercache/clock"
import { ObjectSource } from "@tiercache/config"

import { CacheNotConfiguredError } from "../../core/errors"
import { buildCacheKey } from "../../core/key/cache-key"
import { createQueryDescriptor } from "../../core/key/query-descriptor"
import { CacheState } from "../../core/state/cache-state"
import { sampleTable } from "../../tests/utils/fixtures"
import { RecordingLogger } from "../../tests/utils/recording-logger"
import { makeTempDir, type TempDir } from "../../tests/utils/temp-dir"
import { createCache, createCacheFromConfig } from "../create"
import { TableSerializer } from "../serializers/table-serializer"

const KEY = buildCacheKey("DAC1", { years: [2020] })

describe("createCache", () => {
  let tmp: TempDir

  beforeEach(async () => {
    tmp = await makeTempDir()
  })

  afterEach(async () => {
    await tmp.cleanup()
  })

  it("wires the tiers so a second resolve is served from cache", async () => {
    const cache = createCache({
      serializer: new TableSerializer(),
      baseDirectory: tmp.path,
      state: new CacheState(),
      clock: new FakeClock(0),
    })
    const fetchFn = vi.fn(async (_datasetId: string) => sampleTable())

    await cache.resolve(KEY, "DAC1", fetchFn)
    await cache.resolve(KEY, "DAC1", fetchFn)

    expect(fetchFn).toHaveBeenCalledTimes(1)
    expect(cache.memory.size).toBe(1)
    await expect(cache.query.get(KEY)).resolves.toEqual({ kind: "hit", value: sampleTable() })
  })

  it("fails on use until configured", async () => {
    const cache = createCache({ serializer: new TableSerializer(), state: new CacheState() })

    await expect(cache.resolve(KEY, "DAC1", async () => sampleTable())).rejects.toBeInstanceOf(
      CacheNotConfiguredError,
    )

    cache.configure(tmp.path)
    await expect(cache.resolve(KEY, "DAC1", async () => sampleTable())).resolves.toEqual(sampleTable())
  })

  it("applies the initial switch and toggles it", () => {
    const cache = createCache({
      serializer: new TableSerializer(),
      state: new CacheState(),
      enabled: false,
    })

    expect(cache.isEnabled()).toBe(false)
    cache.enable()
    expect(cache.isEnabled()).toBe(true)
    cache.disable()
    expect(cache.state.isEnabled()).toBe(false)
  })

  it("clears every tier through the cache object", async () => {
    const cache = createCache({
      serializer: new TableSerializer(),
      baseDirectory: tmp.path,
      state: new CacheState(),
    })

    await cache.reader.read(createQueryDescriptor({ dataset: "DAC1", years: [2020] }), {
      fetch: async () => sampleTable(),
    })

    await expect(cache.clearAll()).resolves.toEqual({ removed: 2, failures: [] })
  })
})

describe("createCacheFromConfig", () => {
  let tmp: TempDir

  beforeEach(async () => {
    tmp = await makeTempDir()
  })

  afterEach(async () => {
    await tmp.cleanup()
  })

  it("configures the cache from its sources", async () => {
    const logger = new RecordingLogger()
    const cache = await createCacheFromConfig(new TableSerializer(), {
      sources: [new ObjectSource({ CACHE_DIR: tmp.path, CACHE_ENABLED: false })],
      state: new CacheState(),
      logger,
    })

    expect(cache.isEnabled()).toBe(false)
    expect(cache.state.baseDirectory).toBe(tmp.path)
    expect(logger.at("debug")).toEqual([
      {
        level: "debug",
        message: "cache configuration loaded",
        bindings: {},
        meta: { path: tmp.path },
      },
    ])
  })

  it("passes the query TTL on to the query tier", async () => {
    const clock = new FakeClock(Date.now())
    const cache = await createCacheFromConfig(new TableSerializer(), {
      sources: [new ObjectSource({ CACHE_DIR: tmp.path, QUERY_TTL_MS: 1_000 })],
      state: new CacheState(),
      clock,
      logger: new RecordingLogger(),
    })

    await cache.query.set(KEY, sampleTable())
    await expect(cache.query.get(KEY)).resolves.toEqual({ kind: "hit", value: sampleTable() })

    clock.advance(60_000)
    await expect(cache.query.get(KEY)).resolves.toEqual({ kind: "miss" })
  })
})

import { readdir, writeFile } from "node:fs/promises"

import { QueryTier } from "../../../adapters/fs/query-tier"
import type { Table } from "../../../adapters/serializers/table-serializer"
import type { ReadTier } from "../../../ports/tier"
import { sampleTable, tierFixture } from "../../../tests/utils/fixtures"
import { RecordingLogger } from "../../../tests/utils/recording-logger"
import { makeTempDir, type TempDir } from "../../../tests/utils/temp-dir"
import { makeTiers, stubTier } from "../../../tests/utils/tiers"
import { StorageError } from "../../errors"
import { buildCacheKey } from "../../key/cache-key"
import { CacheController } from "../cache-controller"

const KEY = buildCacheKey("DAC1", { years: [2020, 2021], providers: [4] })
const OTHER_KEY = buildCacheKey("DAC1", { years: [2022] })

function setup(baseDirectory: string, tiers?: readonly ReadTier<Table>[]) {
  const logger = new RecordingLogger()
  const fixture = tierFixture(baseDirectory, logger)
  const { memory, query, bulk } = makeTiers(fixture)
  const controller = new CacheController<Table>({
    state: fixture.state,
    tiers: tiers ?? [memory, query],
    bulk,
    logger,
  })

  return { fixture, logger, memory, query, bulk, controller }
}

function countingFetch(table: Table = sampleTable()) {
  return vi.fn(async (_datasetId: string) => table)
}

describe("CacheController", () => {
  let tmp: TempDir

  beforeEach(async () => {
    tmp = await makeTempDir()
  })

  afterEach(async () => {
    await tmp.cleanup()
  })

  describe("resolve", () => {
    it("computes a miss once and stores it in every tier", async () => {
      const { controller, memory, fixture } = setup(tmp.path)
      const fetchFn = countingFetch()

      await expect(controller.resolve(KEY, "DAC1", fetchFn)).resolves.toEqual(sampleTable())

      expect(fetchFn).toHaveBeenCalledTimes(1)
      expect(fetchFn).toHaveBeenCalledWith("DAC1")
      await expect(memory.get(KEY)).resolves.toEqual({ kind: "hit", value: sampleTable() })

      const fromDisk = new QueryTier<Table>(fixture)
      await expect(fromDisk.get(KEY)).resolves.toEqual({ kind: "hit", value: sampleTable() })
    })

    it("answers repeated calls from the memory tier", async () => {
      const { controller, logger } = setup(tmp.path)
      const fetchFn = countingFetch()

      await controller.resolve(KEY, "DAC1", fetchFn)
      await controller.resolve(KEY, "DAC1", fetchFn)

      expect(fetchFn).toHaveBeenCalledTimes(1)
      expect(logger.at("debug").filter((e) => e.message === "cache hit")[0]?.meta).toEqual({
        key: KEY,
        datasetId: "DAC1",
        tier: "memory",
      })
    })

    it("promotes a query tier hit into memory", async () => {
      const { controller, memory, query } = setup(tmp.path)
      const fetchFn = countingFetch()

      await query.set(KEY, sampleTable())

      await expect(controller.resolve(KEY, "DAC1", fetchFn)).resolves.toEqual(sampleTable())
      expect(fetchFn).not.toHaveBeenCalled()
      expect(memory.size).toBe(1)
    })

    it("treats a corrupt entry as a miss and logs it", async () => {
      const { controller, query, logger } = setup(tmp.path)
      const fetchFn = countingFetch()

      await query.set(KEY, sampleTable())
      await writeFile(query.pathFor(KEY), "{\"columns\":")

      await expect(controller.resolve(KEY, "DAC1", fetchFn)).resolves.toEqual(sampleTable())
      expect(fetchFn).toHaveBeenCalledTimes(1)

      const warnings = logger.at("warn")
      expect(warnings).toHaveLength(1)
      expect(warnings[0]).toMatchObject({
        message: "corrupt cache entry discarded",
        bindings: { module: "controller" },
        meta: { key: KEY, tier: "query" },
      })

      await expect(query.get(KEY)).resolves.toEqual({ kind: "hit", value: sampleTable() })
    })

    it("propagates fetch errors and stores nothing", async () => {
      const { controller, memory, query } = setup(tmp.path)
      const failure = new Error("rate limited")

      await expect(
        controller.resolve(KEY, "DAC1", async () => {
          throw failure
        }),
      ).rejects.toBe(failure)

      expect(memory.size).toBe(0)
      await expect(query.get(KEY)).resolves.toEqual({ kind: "miss" })
    })

    it("propagates storage errors without returning the value", async () => {
      const failure = new StorageError("/cache/queries/x.table.json", "rename", new Error("EXDEV"))
      const { memory } = setup(tmp.path)
      const { controller } = setup(tmp.path, [
        memory,
        stubTier({
          set: async () => {
            throw failure
          },
        }),
      ])

      await expect(controller.resolve(KEY, "DAC1", countingFetch())).rejects.toBe(failure)
      expect(memory.size).toBe(0)
    })
  })

  describe("enable / disable", () => {
    it("starts enabled", () => {
      const { controller } = setup(tmp.path)

      expect(controller.isEnabled()).toBe(true)
    })

    it("calls fetchFn for every resolve while disabled and touches no tier", async () => {
      const { controller, memory } = setup(tmp.path)
      const fetchFn = countingFetch()

      controller.disable()
      for (let i = 0; i < 3; i++) {
        await controller.resolve(KEY, "DAC1", fetchFn)
      }

      expect(fetchFn).toHaveBeenCalledTimes(3)
      expect(memory.size).toBe(0)
      await expect(readdir(tmp.path)).resolves.toEqual([])
    })

    it("ignores entries stored before it was disabled", async () => {
      const { controller } = setup(tmp.path)

      await controller.resolve(KEY, "DAC1", countingFetch(sampleTable([[2020, 4, 1]])))
      controller.disable()

      await expect(controller.resolve(KEY, "DAC1", countingFetch())).resolves.toEqual(sampleTable())
    })

    it("caches again once re-enabled", async () => {
      const { controller, logger } = setup(tmp.path)
      const fetchFn = countingFetch()

      controller.disable()
      controller.enable()
      await controller.resolve(KEY, "DAC1", fetchFn)
      await controller.resolve(KEY, "DAC1", fetchFn)

      expect(fetchFn).toHaveBeenCalledTimes(1)
      expect(logger.at("info").map((e) => e.message)).toEqual(["cache disabled", "cache enabled"])
    })
  })

  describe("invalidate", () => {
    it("drops the key from every read tier", async () => {
      const { controller, memory, query } = setup(tmp.path)

      await controller.resolve(KEY, "DAC1", countingFetch())
      await controller.invalidate(KEY)

      await expect(memory.get(KEY)).resolves.toEqual({ kind: "miss" })
      await expect(query.get(KEY)).resolves.toEqual({ kind: "miss" })
    })
  })

  describe("clearAll", () => {
    it("leaves every tier missing every previous key", async () => {
      const { controller, memory, query, bulk, logger } = setup(tmp.path)

      await controller.resolve(KEY, "DAC1", countingFetch())
      await controller.resolve(OTHER_KEY, "DAC1", countingFetch())
      await bulk.ensure("DAC1", {}, countingFetch())

      await expect(controller.clearAll()).resolves.toEqual({ removed: 6, failures: [] })

      for (const key of [KEY, OTHER_KEY]) {
        await expect(memory.get(key)).resolves.toEqual({ kind: "miss" })
        await expect(query.get(key)).resolves.toEqual({ kind: "miss" })
      }
      await expect(bulk.head("DAC1")).resolves.toBeNull()

      expect(logger.at("info").at(-1)).toMatchObject({
        message: "cache cleared",
        meta: { removed: 6 },
      })
    })

    it("keeps clearing after a tier fails and reports the failure", async () => {
      const { controller: healthy, memory, bulk } = setup(tmp.path)
      const { controller, logger } = setup(tmp.path, [
        memory,
        stubTier({
          clear: async () => {
            throw new Error("disk gone")
          },
        }),
      ])

      await healthy.resolve(KEY, "DAC1", countingFetch())
      await bulk.ensure("DAC1", {}, countingFetch())

      const report = await controller.clearAll()

      // memory entry, bulk data file and its manifest
      expect(report.removed).toBe(3)
      expect(report.failures).toHaveLength(1)
      expect(report.failures[0]).toMatchObject({
        tier: "query",
        error: { code: "unknown", message: "disk gone" },
      })

      expect(memory.size).toBe(0)
      await expect(bulk.head("DAC1")).resolves.toBeNull()
      expect(logger.at("warn")).toHaveLength(1)
      expect(logger.at("warn")[0]?.message).toBe("cache cleared with failures")
    })
  })
})

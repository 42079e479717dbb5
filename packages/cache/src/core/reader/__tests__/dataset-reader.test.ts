import { readdir } from "node:fs/promises"
import { join } from "node:path"

import { filterTable, type Table } from "../../../adapters/serializers/table-serializer"
import type { Fetcher } from "../../../ports/fetcher"
import type { QueryDescriptor } from "../../../ports/query-descriptor"
import { sampleTable, tierFixture } from "../../../tests/utils/fixtures"
import { makeTempDir, type TempDir } from "../../../tests/utils/temp-dir"
import { makeTiers } from "../../../tests/utils/tiers"
import { CacheController } from "../../controller/cache-controller"
import { createQueryDescriptor, queryKey } from "../../key/query-descriptor"
import { DatasetReader } from "../dataset-reader"

function setup(baseDirectory: string) {
  const fixture = tierFixture(baseDirectory)
  const { memory, query, bulk } = makeTiers(fixture)
  const controller = new CacheController<Table>({
    state: fixture.state,
    tiers: [memory, query],
    bulk,
    logger: fixture.logger,
  })

  return { controller, bulk, reader: new DatasetReader<Table>({ controller, bulk }) }
}

function byYear(table: Table, query: QueryDescriptor): Table {
  return filterTable(table, (row) => {
    const year = row["year"]
    return typeof year === "number" && query.years.includes(year)
  })
}

describe("DatasetReader", () => {
  let tmp: TempDir

  beforeEach(async () => {
    tmp = await makeTempDir()
  })

  afterEach(async () => {
    await tmp.cleanup()
  })

  describe("read", () => {
    it("shares one stored value between reorderings of the same query", async () => {
      const { reader } = setup(tmp.path)
      const fetcher: Fetcher<Table> = { fetch: vi.fn(async () => sampleTable()) }

      const first = createQueryDescriptor({ dataset: "DAC1", years: [2020, 2021], providers: [4] })
      const second = createQueryDescriptor({ dataset: "DAC1", years: [2021, 2020], providers: [4] })

      expect(queryKey(first)).toBe(queryKey(second))

      const a = await reader.read(first, fetcher)
      const b = await reader.read(second, fetcher)

      expect(a).toEqual(sampleTable())
      expect(b).toEqual(a)
      expect(fetcher.fetch).toHaveBeenCalledTimes(1)
      expect(fetcher.fetch).toHaveBeenCalledWith("DAC1", first)
      await expect(readdir(join(tmp.path, "queries"))).resolves.toEqual([
        `${queryKey(first)}.table.json`,
      ])
    })

    it("fetches separately for a different filter", async () => {
      const { reader } = setup(tmp.path)
      const fetcher: Fetcher<Table> = { fetch: vi.fn(async () => sampleTable()) }

      await reader.read(createQueryDescriptor({ dataset: "DAC1", years: [2020] }), fetcher)
      await reader.read(createQueryDescriptor({ dataset: "DAC1", years: [2021] }), fetcher)

      expect(fetcher.fetch).toHaveBeenCalledTimes(2)
    })
  })

  describe("readFromBulk", () => {
    it("downloads the dataset once and filters it per query", async () => {
      const { reader, bulk } = setup(tmp.path)
      const fetchBulk = vi.fn(async (_datasetId: string) => sampleTable())
      const filter = vi.fn(byYear)

      const y2020 = createQueryDescriptor({ dataset: "DAC1", years: [2020] })
      const y2021 = createQueryDescriptor({ dataset: "DAC1", years: [2021] })

      await expect(reader.readFromBulk(y2020, { fetchBulk, filter })).resolves.toEqual(
        sampleTable([[2020, 4, 100]]),
      )
      await expect(reader.readFromBulk(y2021, { fetchBulk, filter })).resolves.toEqual(
        sampleTable([[2021, 4, 110]]),
      )
      await expect(reader.readFromBulk(y2021, { fetchBulk, filter })).resolves.toEqual(
        sampleTable([[2021, 4, 110]]),
      )

      expect(fetchBulk).toHaveBeenCalledTimes(1)
      expect(filter).toHaveBeenCalledTimes(2)
      await expect(bulk.head("DAC1")).resolves.not.toBeNull()
    })

    it("passes the version through to the bulk tier", async () => {
      const { reader, bulk } = setup(tmp.path)
      const fetchBulk = vi.fn(async (_datasetId: string) => sampleTable())
      const query = createQueryDescriptor({ dataset: "CRS", years: [2020] })

      await reader.readFromBulk(query, { fetchBulk, filter: byYear, version: "2024-06" })

      await expect(bulk.manifest("CRS")).resolves.toMatchObject({ version: "2024-06" })
    })

    it("filters in memory without touching disk while disabled", async () => {
      const { reader, controller } = setup(tmp.path)
      const fetchBulk = vi.fn(async (_datasetId: string) => sampleTable())
      const query = createQueryDescriptor({ dataset: "DAC1", years: [2021] })

      controller.disable()

      await expect(reader.readFromBulk(query, { fetchBulk, filter: byYear })).resolves.toEqual(
        sampleTable([[2021, 4, 110]]),
      )
      await reader.readFromBulk(query, { fetchBulk, filter: byYear })

      expect(fetchBulk).toHaveBeenCalledTimes(2)
      await expect(readdir(tmp.path)).resolves.toEqual([])
    })
  })
})

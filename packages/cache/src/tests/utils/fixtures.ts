import { FakeClock } from "@tiercache/clock"
import { createNullLogger, type Logger } from "@tiercache/logger"

import { TableSerializer, type Table } from "../../adapters/serializers/table-serializer"
import { CacheState } from "../../core/state/cache-state"

export const START = 1_700_000_000_000

export const DAY_MS = 24 * 60 * 60 * 1000

export function sampleTable(rows: Table["rows"] = [[2020, 4, 100], [2021, 4, 110]]): Table {
  return { columns: ["year", "provider", "value"], rows }
}

export type TierFixture = {
  state: CacheState
  clock: FakeClock
  serializer: TableSerializer
  logger: Logger
}

export function tierFixture(baseDirectory: string, logger: Logger = createNullLogger()): TierFixture {
  return {
    state: new CacheState({ baseDirectory }),
    clock: new FakeClock(START),
    serializer: new TableSerializer(),
    logger,
  }
}

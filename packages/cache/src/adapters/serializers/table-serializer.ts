import { z } from "zod"

import { JsonSerializer } from "./json-serializer"

export const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

export type Cell = z.infer<typeof cellSchema>

export const tableSchema = z
  .object({
    columns: z.array(z.string()),
    rows: z.array(z.array(cellSchema)),
  })
  .refine((t) => t.rows.every((row) => row.length === t.columns.length), {
    message: "every row must have one cell per column",
    path: ["rows"],
  })

/** Column-named rows; the tabular payload most datasets are cached as. */
export type Table = z.infer<typeof tableSchema>

export class TableSerializer extends JsonSerializer<Table> {
  constructor() {
    super(tableSchema, { format: "table.json" })
  }
}

/**
 * Rows of `table` for which `predicate` holds, with each row presented as a
 * column-name record.
 */
export function filterTable(
  table: Table,
  predicate: (row: Readonly<Record<string, Cell>>) => boolean,
): Table {
  return {
    columns: table.columns,
    rows: table.rows.filter((row) =>
      predicate(Object.fromEntries(table.columns.map((column, i): [string, Cell] => [column, row[i] ?? null]))),
    ),
  }
}

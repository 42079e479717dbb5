import { createHash } from "node:crypto"

import type { KeyParamValue } from "../../../ports/cache-key"
import { InvalidDatasetIdError, KeyConstructionError } from "../../errors"
import { buildCacheKey, canonicalParams } from "../cache-key"

describe("buildCacheKey", () => {
  it("is a 64 character hex SHA-256 digest", () => {
    expect(buildCacheKey("DAC1", { years: [2020] })).toMatch(/^[0-9a-f]{64}$/)
  })

  it("hashes the canonical JSON of the dataset and its sorted parameters", () => {
    const expected = createHash("sha256")
      .update('["DAC1",[["providers",[4,12]],["years",[2020,2021]]]]')
      .digest("hex")

    expect(buildCacheKey("DAC1", { years: [2021, 2020], providers: [12, 4, 12] })).toBe(expected)
  })

  it("ignores list ordering and duplicates", () => {
    const a = buildCacheKey("CRS", { providers: [4, 12], indicators: ["b", "a"] })
    const b = buildCacheKey("CRS", { providers: [12, 4, 12], indicators: ["a", "b", "a"] })

    expect(a).toBe(b)
  })

  it("gives the same key for the DAC1 example regardless of year order", () => {
    const a = buildCacheKey("DAC1", { years: [2020, 2021], providers: [4] })
    const b = buildCacheKey("DAC1", { years: [2021, 2020], providers: [4] })

    expect(a).toBe(b)
  })

  it("ignores parameter name order", () => {
    expect(buildCacheKey("DAC1", { measure: "net", currency: "USD" })).toBe(
      buildCacheKey("DAC1", { currency: "USD", measure: "net" }),
    )
  })

  it("treats null, undefined, omitted and empty collections alike", () => {
    const omitted = buildCacheKey("DAC1", { years: [2020] })

    expect(buildCacheKey("DAC1", { years: [2020], providers: null })).toBe(omitted)
    expect(buildCacheKey("DAC1", { years: [2020], providers: undefined })).toBe(omitted)
    expect(buildCacheKey("DAC1", { years: [2020], providers: [] })).toBe(omitted)
    expect(buildCacheKey("DAC1", { years: [2020], providers: new Set() })).toBe(omitted)
  })

  it("treats sets like arrays", () => {
    expect(buildCacheKey("DAC1", { providers: new Set([12, 4]) })).toBe(
      buildCacheKey("DAC1", { providers: [4, 12] }),
    )
  })

  it("separates different values, datasets and types", () => {
    const base = buildCacheKey("DAC1", { years: [2020] })

    expect(buildCacheKey("DAC1", { years: [2021] })).not.toBe(base)
    expect(buildCacheKey("DAC2A", { years: [2020] })).not.toBe(base)
    expect(buildCacheKey("DAC1", { years: ["2020"] })).not.toBe(base)
    expect(buildCacheKey("DAC1", { years: 2020 })).not.toBe(base)
  })

  it("keeps booleans distinct from their string forms", () => {
    expect(buildCacheKey("DAC1", { grants: true })).not.toBe(
      buildCacheKey("DAC1", { grants: "true" }),
    )
  })

  it("rejects NaN and infinite numbers", () => {
    expect(() => buildCacheKey("DAC1", { baseYear: Number.NaN })).toThrow(KeyConstructionError)
    expect(() => buildCacheKey("DAC1", { years: [2020, Number.POSITIVE_INFINITY] })).toThrow(
      KeyConstructionError,
    )
  })

  it("reports the offending parameter", () => {
    try {
      buildCacheKey("DAC1", { years: [2020, Number.NaN] })
      expect.unreachable("expected to throw")
    } catch (err) {
      expect(err).toBeInstanceOf(KeyConstructionError)
      expect(err).toMatchObject({
        code: "key_construction_failed",
        context: { param: "years", value: "NaN" },
      })
    }
  })

  it("rejects collections mixing strings and numbers", () => {
    expect(() => buildCacheKey("CRS", { providers: [4, "4"] })).toThrow(/only strings or only numbers/)
  })

  it("rejects nested objects", () => {
    const params: Record<string, KeyParamValue> = {}
    Reflect.set(params, "filters", { year: 2020 })

    expect(() => buildCacheKey("CRS", params)).toThrow(KeyConstructionError)
  })

  it("rejects dataset ids that are not safe file names", () => {
    expect(() => buildCacheKey("../etc", {})).toThrow(InvalidDatasetIdError)
    expect(() => buildCacheKey("", {})).toThrow(InvalidDatasetIdError)
  })

  it("rejects dotted dataset ids, which could name another dataset's sidecar files", () => {
    expect(() => buildCacheKey("DAC1.meta", {})).toThrow(InvalidDatasetIdError)
    expect(() => buildCacheKey("CRS.v2", {})).toThrow(InvalidDatasetIdError)
    expect(buildCacheKey("DAC2A", {})).toMatch(/^[0-9a-f]{64}$/)
    expect(buildCacheKey("multi_system-2024", {})).toMatch(/^[0-9a-f]{64}$/)
  })
})

describe("canonicalParams", () => {
  it("sorts names, sorts numbers numerically and drops absent values", () => {
    expect(
      canonicalParams({
        years: [2021, 100, 2020, 2021],
        currency: "EUR",
        providers: null,
        recipients: [],
        baseYear: 2022,
      }),
    ).toEqual([
      ["baseYear", 2022],
      ["currency", "EUR"],
      ["years", [100, 2020, 2021]],
    ])
  })

  it("folds negative zero into zero", () => {
    expect(canonicalParams({ offsets: [0, -0] })).toEqual([["offsets", [0]]])
  })
})

import { describe, it, expect } from "@effect/vitest"
import { Effect, Option } from "effect"
import { ForcingDataset, fromRecords, makeDataset } from "../src/Dataset.js"
import { coreInput, datasetOf } from "./fixtures.js"

describe("ForcingDataset", () => {
  it.effect("decodes ISO strings, epoch milliseconds and dates", () =>
    Effect.gen(function* () {
      const dataset = yield* makeDataset({
        timestamps: ["2020-06-01T00:00:00Z", Date.UTC(2020, 5, 2), new Date(Date.UTC(2020, 5, 3))],
        variables: { temperature: [20, 22, 25] },
      })

      expect(dataset.length).toBe(3)
      expect(dataset.timestamps.map((date) => date.toISOString())).toEqual([
        "2020-06-01T00:00:00.000Z",
        "2020-06-02T00:00:00.000Z",
        "2020-06-03T00:00:00.000Z",
      ])
    }),
  )

  it.effect("exposes variables by name", () =>
    Effect.gen(function* () {
      const dataset = yield* makeDataset(coreInput)

      expect(dataset.variableNames).toEqual(["temperature", "relative_humidity", "wind_speed", "net_radiation"])
      expect(dataset.has("wind_speed")).toBe(true)
      expect(dataset.has("lai")).toBe(false)
      expect(dataset.has("toString")).toBe(false)
      expect(Option.getOrThrow(dataset.series("net_radiation"))).toEqual([15, 18, 20])
      expect(Option.isNone(dataset.series("co2"))).toBe(true)
    }),
  )

  it.effect("reads null cells as NaN", () =>
    Effect.gen(function* () {
      const dataset = yield* makeDataset({
        timestamps: ["2020-06-01", "2020-06-02"],
        variables: { temperature: [20, null] },
      })

      const series = Option.getOrThrow(dataset.series("temperature"))
      expect(series[0]).toBe(20)
      expect(Number.isNaN(series[1])).toBe(true)
    }),
  )

  it.effect("accepts an empty time axis", () =>
    Effect.gen(function* () {
      const dataset = yield* makeDataset({ timestamps: [], variables: {} })
      expect(dataset.length).toBe(0)
      expect(dataset.variableNames).toEqual([])
    }),
  )

  it.effect("rejects ragged series", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        makeDataset({
          timestamps: ["2020-06-01", "2020-06-02", "2020-06-03"],
          variables: { temperature: [20, 22] },
        }),
      )

      expect(error._tag).toBe("DatasetValidationError")
      expect(error.message).toBe('Invalid forcing dataset: variable "temperature" has 2 values for 3 timestamps')
    }),
  )

  it.effect("rejects timestamps that are not strictly increasing", () =>
    Effect.gen(function* () {
      const unsorted = yield* Effect.flip(
        makeDataset({ timestamps: ["2020-06-02", "2020-06-01"], variables: {} }),
      )
      const duplicated = yield* Effect.flip(
        makeDataset({ timestamps: ["2020-06-01", "2020-06-01"], variables: {} }),
      )

      expect(unsorted.problem).toBe("timestamps must be strictly increasing (index 1: 2020-06-01T00:00:00.000Z)")
      expect(duplicated._tag).toBe("DatasetValidationError")
    }),
  )

  it.effect("rejects unparseable timestamps and non-numeric cells", () =>
    Effect.gen(function* () {
      const badDate = yield* Effect.flip(makeDataset({ timestamps: ["not a date"], variables: {} }))
      const badCell = yield* Effect.flip(
        makeDataset({ timestamps: ["2020-06-01"], variables: { temperature: ["warm"] } }),
      )

      expect(badDate._tag).toBe("DatasetValidationError")
      expect(badCell._tag).toBe("DatasetValidationError")
    }),
  )

  it("enforces the shape on direct construction", () => {
    const first = new Date(Date.UTC(2020, 5, 1))
    const second = new Date(Date.UTC(2020, 5, 2))
    const days = [first, second]

    expect(() => new ForcingDataset({ timestamps: days, variables: { temperature: [20, 22, 25], net_radiation: [1] } }))
      .toThrow('variable "temperature" has 3 values for 2 timestamps')
    expect(() => new ForcingDataset({ timestamps: [second, first], variables: {} }))
      .toThrow("timestamps must be strictly increasing (index 1: 2020-06-01T00:00:00.000Z)")
    expect(new ForcingDataset({ timestamps: days, variables: { temperature: [20, 22] } }).length).toBe(2)
  })

  it("copies and freezes series", () => {
    const temperature = [20, 22, 25]
    const dataset = datasetOf({ timestamps: ["2020-06-01", "2020-06-02", "2020-06-03"], variables: { temperature } })
    temperature[0] = 99

    const series = Option.getOrThrow(dataset.series("temperature"))
    expect(series[0]).toBe(20)
    expect(Object.isFrozen(series)).toBe(true)
  })

  it("selects and drops variables without touching the original", () => {
    const dataset = datasetOf(coreInput)

    expect(dataset.select(["temperature", "net_radiation", "lai"]).variableNames).toEqual([
      "temperature",
      "net_radiation",
    ])
    expect(dataset.without(["wind_speed"]).variableNames).toEqual([
      "temperature",
      "relative_humidity",
      "net_radiation",
    ])
    expect(dataset.without(["wind_speed"]).length).toBe(3)
    expect(dataset.has("wind_speed")).toBe(true)
  })
})

describe("fromRecords", () => {
  it.effect("builds columns from rows and fills gaps with NaN", () =>
    Effect.gen(function* () {
      const dataset = yield* fromRecords([
        { timestamp: "2020-06-01", temperature: 20, net_radiation: 15 },
        { timestamp: "2020-06-02", temperature: 22 },
        { timestamp: "2020-06-03", temperature: 25, net_radiation: null },
      ])

      expect(dataset.variableNames).toEqual(["temperature", "net_radiation"])
      expect(Option.getOrThrow(dataset.series("temperature"))).toEqual([20, 22, 25])
      const radiation = Option.getOrThrow(dataset.series("net_radiation"))
      expect(radiation[0]).toBe(15)
      expect(Number.isNaN(radiation[1])).toBe(true)
      expect(Number.isNaN(radiation[2])).toBe(true)
    }),
  )

  it.effect("reports non-numeric values", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(fromRecords([{ timestamp: "2020-06-01", temperature: "warm" }]))
      expect(error._tag).toBe("DatasetValidationError")
    }),
  )
})

import { describe, it, expect } from "@effect/vitest"
import { Effect, Option } from "effect"
import { compare } from "../../src/Comparison.js"
import { ExecutionEngine } from "../../src/ExecutionEngine.js"
import { FormulaRegistry } from "../../src/Registry.js"
import type { ResultsTable } from "../../src/ResultsTable.js"
import { column, componentBreakdown, formulaNames, toRows } from "../../src/ResultsTable.js"
import { coreDataset, dividesByZero, fullDataset } from "../fixtures.js"

const outputs = (table: ResultsTable) =>
  table.entries.map(({ result, partition }) => ({
    formula: result.formula,
    total: result.total,
    components: result.components,
    partition,
  }))

const CORE_FORMULAS = ["PM", "PT", "CR-Bouchet", "CR-AA", "CR-GG", "CR-nonlinear", "Penman-OW"]

describe("comparison over the core drivers", () => {
  it.effect("runs every formula the four drivers can feed", () =>
    Effect.gen(function* () {
      const report = yield* compare(coreDataset())

      expect(formulaNames(report.table)).toEqual(CORE_FORMULAS)
      expect(report.failures).toEqual([])
      expect(report.skipped).toHaveLength(8)

      const pm = Option.getOrThrow(column(report.table, "PM"))
      expect(pm[0]).toBeCloseTo(5.084749310288465, 10)
      expect(pm[1]).toBeCloseTo(5.901311737295605, 10)
      expect(pm[2]).toBeCloseTo(6.381670680992596, 10)

      const rows = toRows(report.table)
      expect(rows[2]?.values["Penman-OW"]).toBeCloseTo(7.375188788074098, 10)
      expect(rows[2]?.values["CR-AA"]).toBeCloseTo(7.019519333126187, 10)
      expect(rows[0]?.values["CR-GG"]).toBeCloseTo(0.29091156954772623, 10)
      expect(rows[1]?.values["CR-nonlinear"]).toBeCloseTo(6.115235298662543, 10)
    }).pipe(Effect.provide(ExecutionEngine.Default)))

  it.effect("computes statistics over the successful formulas", () =>
    Effect.gen(function* () {
      const { statistics } = yield* compare(coreDataset())
      const pm = statistics.summary.find((stats) => stats.formula === "PM")

      expect(statistics.summary.map((stats) => stats.formula)).toEqual(CORE_FORMULAS)
      expect(pm?.count).toBe(3)
      expect(pm?.mean).toBeCloseTo(5.789243909525555, 10)
      expect(Option.getOrThrow(statistics.correlation.get("PT", "CR-Bouchet"))).toBeCloseTo(1, 12)
      expect(Option.getOrThrow(statistics.difference.get("PT", "CR-Bouchet"))).toBeCloseTo(0, 12)
      expect(Option.getOrThrow(statistics.difference.get("PM", "PT"))).toBeCloseTo(0.6680772879731721, 10)
    }).pipe(Effect.provide(ExecutionEngine.Default)))
})

describe("component breakdown", () => {
  it.effect("leaves complementary diagnostics out", () =>
    Effect.gen(function* () {
      const { table } = yield* compare(coreDataset())
      const bouchet = table.entries.find((entry) => entry.result.formula === "CR-Bouchet")

      expect(Object.keys(bouchet?.result.components ?? {})).toEqual(["wet_environment", "apparent_potential"])
      expect(bouchet?.partition).toEqual({})
      expect(componentBreakdown(table)).toEqual({})
    }).pipe(Effect.provide(ExecutionEngine.Default)))

  it.effect("lists exactly the partitioning formulas on full data", () =>
    Effect.gen(function* () {
      const { table } = yield* compare(fullDataset())
      const breakdown = componentBreakdown(table)

      expect(Object.keys(breakdown)).toEqual(["PML", "PM-CO2-LAI", "PML-v2", "PT-JPL-partition"])
      expect(breakdown["CR-Bouchet"]).toBeUndefined()
    }).pipe(Effect.provide(ExecutionEngine.Default)))
})

describe("comparison with incomplete data", () => {
  it.effect("skips wind-dependent formulas when wind is absent", () =>
    Effect.gen(function* () {
      const report = yield* compare(coreDataset().without(["wind_speed"]))
      const reasons = new Map<string, string>(report.skipped.map((skip) => [skip.formula, skip.reason]))

      expect(formulaNames(report.table)).toEqual(["PT", "CR-Bouchet", "CR-GG", "CR-nonlinear"])
      expect(reasons.get("PM")).toBe("missing: wind_speed")
      expect(reasons.get("CR-AA")).toBe("missing: wind_speed")
      expect(reasons.get("Penman-OW")).toBe("missing: wind_speed")
      expect(Option.getOrThrow(column(report.table, "PT"))[0]).toBeCloseTo(5.264226714530934, 10)
    }).pipe(Effect.provide(ExecutionEngine.Default)))

  it.effect("isolates a failing user formula from the catalog", () =>
    Effect.gen(function* () {
      const baseline = yield* compare(coreDataset())
      const registry = yield* FormulaRegistry
      yield* registry.register(dividesByZero("broken"))
      const report = yield* compare(coreDataset())

      expect(formulaNames(report.table)).toEqual(CORE_FORMULAS)
      expect(report.failures.map((failure) => failure.message)).toEqual([
        'Formula "broken" failed: output contains non-finite values',
      ])
      expect(outputs(report.table)).toEqual(outputs(baseline.table))
      expect(report.statistics.summary).toEqual(baseline.statistics.summary)
      expect(report.statistics.correlation.labels).toEqual(CORE_FORMULAS)
    }).pipe(Effect.provide(ExecutionEngine.Default)))
})

import { describe, it, expect } from "@effect/vitest"
import { Option } from "effect"
import {
  column,
  componentBreakdown,
  ComputationResult,
  formulaNames,
  PartitionMismatch,
  ResultsTable,
  TableEntry,
  toRows,
  warnings,
} from "../src/ResultsTable.js"
import { FormulaName } from "../src/Types.js"

const days = [new Date(Date.UTC(2020, 5, 1)), new Date(Date.UTC(2020, 5, 2))]

const plain = new ComputationResult({
  formula: FormulaName.make("PT"),
  family: "radiation-based",
  total: [3, 4],
  components: {},
})

const split = new ComputationResult({
  formula: FormulaName.make("PML"),
  family: "vegetation-aware",
  total: [5, Number.NaN],
  components: { transpiration: [4, 1], evaporation: [1, 1] },
})

const complementary = new ComputationResult({
  formula: FormulaName.make("CR-Bouchet"),
  family: "complementary-relationship",
  total: [2, 3],
  components: { wet_environment: [2.5, 3.5] },
})

const mismatch = new PartitionMismatch({
  formula: FormulaName.make("PML"),
  tolerance: 0.01,
  worstDeviation: 0.5,
  violations: 1,
  firstIndex: 0,
})

const table = new ResultsTable({
  timestamps: days,
  entries: [
    new TableEntry({ result: plain, partition: {}, warnings: [] }),
    new TableEntry({ result: split, partition: split.components, warnings: [mismatch] }),
    new TableEntry({ result: complementary, partition: {}, warnings: [] }),
  ],
})

describe("ResultsTable views", () => {
  it("lists formulas in entry order", () => {
    expect(formulaNames(table)).toEqual(["PT", "PML", "CR-Bouchet"])
  })

  it("looks up a column by formula", () => {
    expect(Option.getOrThrow(column(table, "PT"))).toEqual([3, 4])
    expect(Option.isNone(column(table, "PM"))).toBe(true)
  })

  it("pivots totals into rows", () => {
    const rows = toRows(table)

    expect(rows).toHaveLength(2)
    expect(rows[0]?.timestamp.toISOString()).toBe("2020-06-01T00:00:00.000Z")
    expect(rows[0]?.values).toEqual({ PT: 3, PML: 5, "CR-Bouchet": 2 })
    expect(rows[1]?.values["PT"]).toBe(4)
    expect(Number.isNaN(rows[1]?.values["PML"])).toBe(true)
  })

  it("collects components of partitioning formulas only", () => {
    expect(componentBreakdown(table)).toEqual({
      PML: { transpiration: [4, 1], evaporation: [1, 1] },
    })
  })

  it("gathers warnings", () => {
    expect(warnings(table).map((warning) => warning.formula)).toEqual(["PML"])
  })
})

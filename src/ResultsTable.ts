/**
 * Result models and table views.
 *
 * A results table holds one entry per formula that ran successfully, in
 * registration order. Formulas that were skipped or failed are absent rather
 * than filled with placeholders.
 *
 * @since 0.1.0
 */

import { Option, Schema } from "effect"
import type { Series } from "./Types.js"
import { AlgorithmFamily, FormulaName } from "./Types.js"

const SeriesSchema = Schema.Array(Schema.Number)

/**
 * Output of one formula on one dataset. `components` holds every named
 * sub-flux the formula returned besides `total`.
 *
 * @category Models
 * @since 0.1.0
 */
export class ComputationResult extends Schema.Class<ComputationResult>("ComputationResult")({
  formula: FormulaName,
  family: AlgorithmFamily,
  total: SeriesSchema,
  components: Schema.Record({ key: Schema.String, value: SeriesSchema }),
}) {}

/**
 * Warning attached to a result whose declared components do not add up to
 * its total.
 *
 * @category Models
 * @since 0.1.0
 */
export class PartitionMismatch extends Schema.Class<PartitionMismatch>("PartitionMismatch")({
  formula: FormulaName,
  tolerance: Schema.Number,
  /** Largest `|total - sum| / |total|` over the violating timesteps. */
  worstDeviation: Schema.Number,
  violations: Schema.Int,
  firstIndex: Schema.Int,
}) {
  get message(): string {
    return `Formula "${this.formula}" components deviate from total at ${this.violations} timestep(s) ` +
      `(first at index ${this.firstIndex}, worst ${this.worstDeviation}, tolerance ${this.tolerance})`
  }
}

/**
 * A successful result as it sits in a table. `partition` holds the declared
 * sub-fluxes of a partitioning formula and is empty for every other formula,
 * whatever extra series its result carries.
 *
 * @category Models
 * @since 0.1.0
 */
export class TableEntry extends Schema.Class<TableEntry>("TableEntry")({
  result: ComputationResult,
  partition: Schema.Record({ key: Schema.String, value: SeriesSchema }),
  warnings: Schema.Array(PartitionMismatch),
}) {}

/**
 * @category Models
 * @since 0.1.0
 */
export class ResultsTable extends Schema.Class<ResultsTable>("ResultsTable")({
  timestamps: Schema.Array(Schema.ValidDateFromSelf),
  entries: Schema.Array(TableEntry),
}) {}

/**
 * One timestep of a table: the total of every formula at that instant.
 *
 * @category Views
 * @since 0.1.0
 */
export interface TableRow {
  readonly timestamp: Date
  readonly values: Readonly<Record<string, number>>
}

/**
 * @category Views
 * @since 0.1.0
 */
export const formulaNames = (table: ResultsTable): ReadonlyArray<FormulaName> =>
  table.entries.map((entry) => entry.result.formula)

/**
 * Total series of one formula.
 *
 * @category Views
 * @since 0.1.0
 */
export const column = (table: ResultsTable, formula: string): Option.Option<Series> =>
  Option.map(
    Option.fromNullable(table.entries.find((entry) => entry.result.formula === formula)),
    (entry) => entry.result.total,
  )

/**
 * @category Views
 * @since 0.1.0
 */
export const toRows = (table: ResultsTable): ReadonlyArray<TableRow> =>
  table.timestamps.map((timestamp, index) => {
    const values: Record<string, number> = {}
    for (const entry of table.entries) {
      values[entry.result.formula] = entry.result.total[index] ?? Number.NaN
    }
    return { timestamp, values }
  })

/**
 * Declared components of every partitioning formula, keyed by formula name.
 *
 * @category Views
 * @since 0.1.0
 */
export const componentBreakdown = (
  table: ResultsTable,
): Readonly<Record<string, Readonly<Record<string, Series>>>> => {
  const breakdown: Record<string, Readonly<Record<string, Series>>> = {}
  for (const { result, partition } of table.entries) {
    if (Object.keys(partition).length > 0) {
      breakdown[result.formula] = partition
    }
  }
  return breakdown
}

/**
 * Every partition warning in the table, in entry order.
 *
 * @category Views
 * @since 0.1.0
 */
export const warnings = (table: ResultsTable): ReadonlyArray<PartitionMismatch> =>
  table.entries.flatMap((entry) => entry.warnings)

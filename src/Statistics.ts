/**
 * Cross-formula statistics.
 *
 * Computed from the `total` series of a results table only, on demand, never
 * cached. `NaN` marks a missing value; pairwise measures use the timesteps
 * where both formulas have a value.
 *
 * @since 0.1.0
 */

import { Option, Schema } from "effect"
import * as internal from "./internal/statistics.js"
import type { ResultsTable } from "./ResultsTable.js"
import { FormulaName } from "./Types.js"

/**
 * Per-formula descriptive statistics over non-missing values. `std` is the
 * sample standard deviation; `cv` is `NaN` when the mean is zero. Quartiles
 * interpolate linearly between the two nearest ranks.
 *
 * @category Statistics
 * @since 0.1.0
 */
export class FormulaSummary extends Schema.Class<FormulaSummary>("FormulaSummary")({
  formula: FormulaName,
  count: Schema.Int,
  mean: Schema.Number,
  std: Schema.Number,
  cv: Schema.Number,
  min: Schema.Number,
  p25: Schema.Number,
  median: Schema.Number,
  p75: Schema.Number,
  max: Schema.Number,
}) {}

/**
 * Square matrix indexed by formula name on both axes.
 *
 * @category Statistics
 * @since 0.1.0
 */
export class LabeledMatrix extends Schema.Class<LabeledMatrix>("LabeledMatrix")({
  labels: Schema.Array(FormulaName),
  values: Schema.Array(Schema.Array(Schema.Number)),
}) {
  get(row: string, col: string): Option.Option<number> {
    const i = this.labels.findIndex((label) => label === row)
    const j = this.labels.findIndex((label) => label === col)
    return i < 0 || j < 0 ? Option.none() : Option.fromNullable(this.values[i]?.[j])
  }
}

/**
 * @category Statistics
 * @since 0.1.0
 */
export class StatisticsArtifacts extends Schema.Class<StatisticsArtifacts>("StatisticsArtifacts")({
  summary: Schema.Array(FormulaSummary),
  correlation: LabeledMatrix,
  difference: LabeledMatrix,
}) {}

/**
 * @category Statistics
 * @since 0.1.0
 */
export const summary = (table: ResultsTable): ReadonlyArray<FormulaSummary> =>
  table.entries.map(({ result }) => new FormulaSummary({ formula: result.formula, ...internal.describe(result.total) }))

const labelled = (
  table: ResultsTable,
  diagonal: (index: number) => number,
  offDiagonal: (row: number, col: number) => number,
): LabeledMatrix =>
  new LabeledMatrix({
    labels: table.entries.map(({ result }) => result.formula),
    values: internal.symmetricMatrix(table.entries.length, diagonal, offDiagonal),
  })

const totals = (table: ResultsTable) => table.entries.map(({ result }) => result.total)

/**
 * Pearson correlation of every pair of formula totals. The diagonal is
 * exactly 1 for a formula whose values vary and `NaN` otherwise.
 *
 * @category Statistics
 * @since 0.1.0
 */
export const correlationMatrix = (table: ResultsTable): LabeledMatrix => {
  const series = totals(table)
  const at = (index: number) => series[index] ?? []
  return labelled(
    table,
    (index) => (internal.varies(at(index)) ? 1 : Number.NaN),
    (row, col) => internal.pearson(at(row), at(col)),
  )
}

/**
 * Mean absolute difference of every pair of formula totals. The diagonal is
 * exactly 0.
 *
 * @category Statistics
 * @since 0.1.0
 */
export const pairwiseDifferenceMatrix = (table: ResultsTable): LabeledMatrix => {
  const series = totals(table)
  const at = (index: number) => series[index] ?? []
  return labelled(
    table,
    () => 0,
    (row, col) => internal.meanAbsoluteDifference(at(row), at(col)),
  )
}

/**
 * @category Statistics
 * @since 0.1.0
 */
export const analyze = (table: ResultsTable): StatisticsArtifacts =>
  new StatisticsArtifacts({
    summary: summary(table),
    correlation: correlationMatrix(table),
    difference: pairwiseDifferenceMatrix(table),
  })

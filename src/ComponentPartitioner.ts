/**
 * Component partitioning.
 *
 * Formulas that declare sub-fluxes (transpiration, soil evaporation, ...)
 * return them beside `total`. The partitioner exposes those series and flags
 * results whose components do not add up to the total. A mismatch is a
 * warning, never a failure: the result stays in the table.
 *
 * @since 0.1.0
 */

import { Option } from "effect"
import { DEFAULT_SETTINGS } from "./Config.js"
import type { FormulaSpec } from "./Formula.js"
import type { ComputationResult } from "./ResultsTable.js"
import { PartitionMismatch, ResultsTable, TableEntry } from "./ResultsTable.js"
import type { Series } from "./Types.js"

/**
 * @category Partitioning
 * @since 0.1.0
 */
export const DEFAULT_TOLERANCE = DEFAULT_SETTINGS.partitionTolerance

/**
 * Declared component series of `result`. Empty when `spec` does not partition
 * or `result` lacks any declared component.
 *
 * @category Partitioning
 * @since 0.1.0
 */
export const partition = (
  result: ComputationResult,
  spec: FormulaSpec,
): Readonly<Record<string, Series>> => {
  if (!spec.supportsPartition) {
    return {}
  }
  const components: Record<string, Series> = {}
  for (const name of spec.components) {
    const series = result.components[name]
    if (series === undefined) {
      return {}
    }
    components[name] = series
  }
  return components
}

/**
 * Compare the sum of declared components with `total` at every timestep. A
 * timestep violates when `|total - sum| > tolerance * |total|`; timesteps
 * where any value is `NaN` are not checked.
 *
 * @category Partitioning
 * @since 0.1.0
 */
export const checkPartition = (
  result: ComputationResult,
  spec: FormulaSpec,
  tolerance: number = DEFAULT_TOLERANCE,
): Option.Option<PartitionMismatch> => {
  const components = Object.values(partition(result, spec))
  if (components.length === 0) {
    return Option.none()
  }

  let violations = 0
  let firstIndex = -1
  let worstDeviation = 0
  result.total.forEach((total, index) => {
    let sum = 0
    for (const series of components) {
      sum += series[index] ?? Number.NaN
    }
    if (Number.isNaN(total) || Number.isNaN(sum)) {
      return
    }
    const gap = Math.abs(total - sum)
    if (gap > tolerance * Math.abs(total)) {
      violations += 1
      if (firstIndex < 0) {
        firstIndex = index
      }
      worstDeviation = Math.max(worstDeviation, gap / Math.abs(total))
    }
  })

  return violations === 0
    ? Option.none()
    : Option.some(
      new PartitionMismatch({ formula: result.formula, tolerance, worstDeviation, violations, firstIndex }),
    )
}

/**
 * Table entry for `result` with its declared partition and its partition
 * warning, if any.
 *
 * @category Partitioning
 * @since 0.1.0
 */
export const toEntry = (
  result: ComputationResult,
  spec: FormulaSpec,
  tolerance: number = DEFAULT_TOLERANCE,
): TableEntry =>
  new TableEntry({
    result,
    partition: partition(result, spec),
    warnings: Option.toArray(checkPartition(result, spec, tolerance)),
  })

/**
 * Recompute the partition and warnings of every entry. Entries whose formula
 * is not among `specs` keep neither.
 *
 * @category Partitioning
 * @since 0.1.0
 */
export const enrich = (
  table: ResultsTable,
  specs: ReadonlyArray<FormulaSpec>,
  tolerance: number = DEFAULT_TOLERANCE,
): ResultsTable =>
  new ResultsTable({
    timestamps: table.timestamps,
    entries: table.entries.map(({ result }) => {
      const spec = specs.find((candidate) => candidate.name === result.formula)
      return spec === undefined
        ? new TableEntry({ result, partition: {}, warnings: [] })
        : toEntry(result, spec, tolerance)
    }),
  })

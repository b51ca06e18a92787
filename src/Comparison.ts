/**
 * End-to-end comparison: run every registered formula on a dataset, then
 * compute cross-formula statistics over the successful ones.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import type { SkippedFormula } from "./CapabilityResolver.js"
import type { ForcingDataset } from "./Dataset.js"
import type { FormulaExecutionError } from "./Errors.js"
import type { RunOptions } from "./ExecutionEngine.js"
import { ExecutionEngine } from "./ExecutionEngine.js"
import type { ResultsTable } from "./ResultsTable.js"
import type { StatisticsArtifacts } from "./Statistics.js"
import { analyze } from "./Statistics.js"

/**
 * @category Comparison
 * @since 0.1.0
 */
export interface ComparisonReport {
  readonly table: ResultsTable
  readonly skipped: ReadonlyArray<SkippedFormula>
  readonly failures: ReadonlyArray<FormulaExecutionError>
  readonly statistics: StatisticsArtifacts
}

/**
 * @category Comparison
 * @since 0.1.0
 * @example
 * ```ts
 * const report = yield* compare(dataset).pipe(Effect.provide(ExecutionEngine.Default))
 * ```
 */
export const compare = (
  dataset: ForcingDataset,
  options: RunOptions = {},
): Effect.Effect<ComparisonReport, never, ExecutionEngine> =>
  Effect.gen(function* () {
    const engine = yield* ExecutionEngine
    const run = yield* engine.runAll(dataset, options)
    const statistics = analyze(run.table)
    yield* Effect.logInfo(
      `compared ${run.table.entries.length} formula(s) over ${dataset.length} timestep(s); ` +
        `${run.skipped.length} skipped, ${run.failures.length} failed`,
    )
    return { ...run, statistics }
  })

/**
 * Capability resolution.
 *
 * Decides which formulas a dataset can feed and assembles the complete
 * argument set for each. A formula missing any required input is skipped
 * whole; there is no partial execution and no imputation.
 *
 * @since 0.1.0
 */

import { Option, Schema } from "effect"
import type { ForcingDataset } from "./Dataset.js"
import type { FormulaInput, FormulaSpec } from "./Formula.js"
import { FormulaName } from "./Types.js"

/**
 * A formula left out of a batch because the dataset lacks inputs.
 *
 * @category Resolution
 * @since 0.1.0
 */
export class SkippedFormula extends Schema.Class<SkippedFormula>("SkippedFormula")({
  formula: FormulaName,
  missing: Schema.Array(Schema.String),
  reason: Schema.String,
}) {}

/**
 * @category Resolution
 * @since 0.1.0
 */
export interface RunnableFormula {
  readonly spec: FormulaSpec
  readonly arguments: Readonly<Record<string, FormulaInput>>
}

/**
 * @category Resolution
 * @since 0.1.0
 */
export interface Resolution {
  readonly runnable: ReadonlyArray<RunnableFormula>
  readonly skipped: ReadonlyArray<SkippedFormula>
}

/**
 * Required inputs of `spec` the dataset does not carry, in declaration order.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const missingInputs = (dataset: ForcingDataset, spec: FormulaSpec): ReadonlyArray<string> =>
  spec.required.filter((input) => !dataset.has(input))

/**
 * Specs whose required inputs are all present, order preserved.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const runnable = (
  dataset: ForcingDataset,
  specs: ReadonlyArray<FormulaSpec>,
): ReadonlyArray<FormulaSpec> => specs.filter((spec) => missingInputs(dataset, spec).length === 0)

/**
 * Arguments for one invocation: required inputs from the dataset, optional
 * inputs from the dataset when present and from their defaults otherwise.
 * `None` when a required input is absent.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const assembleArguments = (
  dataset: ForcingDataset,
  spec: FormulaSpec,
): Option.Option<Readonly<Record<string, FormulaInput>>> => {
  const args: Record<string, FormulaInput> = {}
  for (const input of spec.required) {
    const series = dataset.series(input)
    if (Option.isNone(series)) {
      return Option.none()
    }
    args[input] = series.value
  }
  for (const [input, fallback] of Object.entries(spec.optional)) {
    args[input] = Option.getOrElse(dataset.series(input), (): FormulaInput => fallback)
  }
  return Option.some(args)
}

/**
 * @category Resolution
 * @since 0.1.0
 */
export const skipReason = (missing: ReadonlyArray<string>): string => `missing: ${missing.join(", ")}`

/**
 * Split `specs` into runnable formulas with their arguments and skipped ones
 * with the inputs they lack.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const resolve = (dataset: ForcingDataset, specs: ReadonlyArray<FormulaSpec>): Resolution => {
  const ready: Array<RunnableFormula> = []
  const skipped: Array<SkippedFormula> = []
  for (const spec of specs) {
    const args = assembleArguments(dataset, spec)
    if (Option.isSome(args)) {
      ready.push({ spec, arguments: args.value })
    } else {
      const missing = missingInputs(dataset, spec)
      skipped.push(new SkippedFormula({ formula: spec.name, missing, reason: skipReason(missing) }))
    }
  }
  return { runnable: ready, skipped }
}

/**
 * Execution engine.
 *
 * Runs every runnable formula of the registry against one dataset. Each
 * formula runs in isolation: an exception or a malformed output is recorded
 * as a failure for that formula and the batch carries on.
 *
 * @since 0.1.0
 */

import { Context, Effect, Either, Layer, Option } from "effect"
import type { FormulaInput, FormulaSpec } from "./Formula.js"
import type { SkippedFormula } from "./CapabilityResolver.js"
import { assembleArguments, missingInputs, resolve } from "./CapabilityResolver.js"
import { toEntry } from "./ComponentPartitioner.js"
import { EngineConfig } from "./Config.js"
import type { ForcingDataset } from "./Dataset.js"
import type { RunOneError } from "./Errors.js"
import { FormulaExecutionError, MissingInputsError } from "./Errors.js"
import { normalizeOutput } from "./internal/output.js"
import { FormulaRegistry } from "./Registry.js"
import type { TableEntry } from "./ResultsTable.js"
import { ComputationResult, ResultsTable } from "./ResultsTable.js"

/**
 * @category Execution
 * @since 0.1.0
 */
export interface RunOptions {
  /** Formulas evaluated at once. Defaults to the configured concurrency. */
  readonly concurrency?: number | "unbounded"
}

/**
 * Outcome of a batch. Never a failure: skipped and failed formulas are listed
 * beside the table.
 *
 * @category Execution
 * @since 0.1.0
 */
export interface BatchRun {
  readonly table: ResultsTable
  readonly skipped: ReadonlyArray<SkippedFormula>
  readonly failures: ReadonlyArray<FormulaExecutionError>
}

const describe = (error: unknown): string => error instanceof Error ? error.message : String(error)

const execute = (
  spec: FormulaSpec,
  args: Readonly<Record<string, FormulaInput>>,
  length: number,
): Effect.Effect<ComputationResult, FormulaExecutionError> =>
  Effect.gen(function* () {
    const fail = (problem: string) => new FormulaExecutionError({ formula: spec.name, problem })

    const output = yield* Effect.try({
      try: () => spec.compute(args, spec.parameters),
      catch: (error) => fail(describe(error)),
    })
    const normalized = yield* Either.match(normalizeOutput(output, length), {
      onLeft: (problem) => Effect.fail(fail(problem)),
      onRight: Effect.succeed,
    })

    const undelivered = spec.components.filter((name) => !Object.hasOwn(normalized.components, name))
    if (undelivered.length > 0) {
      return yield* Effect.fail(fail(`declared components not returned: ${undelivered.join(", ")}`))
    }

    yield* Effect.logDebug("formula evaluated")
    return new ComputationResult({
      formula: spec.name,
      family: spec.family,
      total: normalized.total,
      components: normalized.components,
    })
  }).pipe(
    Effect.annotateLogs("formula", spec.name),
    Effect.withLogSpan("formula"),
  )

/**
 * Invoke one formula on `dataset`, outside any registry.
 *
 * @category Execution
 * @since 0.1.0
 */
export const invokeFormula = (
  spec: FormulaSpec,
  dataset: ForcingDataset,
): Effect.Effect<ComputationResult, MissingInputsError | FormulaExecutionError> =>
  Option.match(assembleArguments(dataset, spec), {
    onNone: () => Effect.fail(new MissingInputsError({ formula: spec.name, missing: missingInputs(dataset, spec) })),
    onSome: (args) => execute(spec, args, dataset.length),
  })

/**
 * @category Execution
 * @since 0.1.0
 */
export interface ExecutionEngineService {
  readonly runAll: (dataset: ForcingDataset, options?: RunOptions) => Effect.Effect<BatchRun>
  readonly runOne: (name: string, dataset: ForcingDataset) => Effect.Effect<TableEntry, RunOneError>
  readonly invoke: (
    spec: FormulaSpec,
    dataset: ForcingDataset,
  ) => Effect.Effect<ComputationResult, MissingInputsError | FormulaExecutionError>
}

/**
 * @category Execution
 * @since 0.1.0
 */
export const makeExecutionEngine: Effect.Effect<ExecutionEngineService, never, FormulaRegistry | EngineConfig> = Effect
  .gen(function* () {
    const registry = yield* FormulaRegistry
    const settings = yield* EngineConfig

    const runAll = (dataset: ForcingDataset, options: RunOptions = {}): Effect.Effect<BatchRun> =>
      Effect.gen(function* () {
        const specs = yield* registry.allSpecs
        const { runnable, skipped } = resolve(dataset, specs)
        for (const skip of skipped) {
          yield* Effect.logDebug("formula skipped").pipe(
            Effect.annotateLogs({ formula: skip.formula, reason: skip.reason }),
          )
        }

        const outcomes = yield* Effect.forEach(
          runnable,
          ({ arguments: args, spec }) =>
            Effect.map(Effect.either(execute(spec, args, dataset.length)), (outcome) => ({ spec, outcome })),
          { concurrency: options.concurrency ?? settings.concurrency },
        )

        const entries: Array<TableEntry> = []
        const failures: Array<FormulaExecutionError> = []
        for (const { outcome, spec } of outcomes) {
          if (Either.isLeft(outcome)) {
            failures.push(outcome.left)
            yield* Effect.logWarning(outcome.left.message)
            continue
          }
          const entry = toEntry(outcome.right, spec, settings.partitionTolerance)
          for (const warning of entry.warnings) {
            yield* Effect.logWarning(warning.message)
          }
          entries.push(entry)
        }

        yield* Effect.logInfo("batch finished").pipe(
          Effect.annotateLogs({ ran: entries.length, skipped: skipped.length, failed: failures.length }),
        )
        return { table: new ResultsTable({ timestamps: dataset.timestamps, entries }), skipped, failures }
      }).pipe(Effect.withLogSpan("runAll"))

    const runOne = (name: string, dataset: ForcingDataset): Effect.Effect<TableEntry, RunOneError> =>
      Effect.gen(function* () {
        const spec = yield* registry.get(name)
        const result = yield* invokeFormula(spec, dataset)
        const entry = toEntry(result, spec, settings.partitionTolerance)
        for (const warning of entry.warnings) {
          yield* Effect.logWarning(warning.message)
        }
        return entry
      })

    const service: ExecutionEngineService = { runAll, runOne, invoke: invokeFormula }
    return service
  })

/**
 * @category Services
 * @since 0.1.0
 */
export class ExecutionEngine extends Context.Tag("et-intercompare/ExecutionEngine")<
  ExecutionEngine,
  ExecutionEngineService
>() {
  /** Engine over whichever registry and configuration the caller provides. */
  static readonly layer = Layer.effect(this, makeExecutionEngine)

  /** Engine, built-in registry and environment configuration, all exposed. */
  static readonly Default = this.layer.pipe(
    Layer.provideMerge(FormulaRegistry.Default),
    Layer.provideMerge(EngineConfig.layer),
  )
}

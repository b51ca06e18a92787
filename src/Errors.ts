/**
 * Error hierarchy for the comparison engine.
 *
 * Setup-time problems (bad registrations) and single-formula failures are
 * tagged errors so callers can pattern match with `Effect.catchTag`. Data
 * problems in batch mode never surface here: they are recorded as per-formula
 * status on the batch result instead.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import type { FormulaName } from "./Types.js"

/**
 * Raised when a formula name is registered twice.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * yield* Effect.fail(new DuplicateFormulaError({ formula: "PM" }))
 * ```
 */
export class DuplicateFormulaError extends Data.TaggedError("DuplicateFormulaError")<{
  readonly formula: string
}> {
  override get message(): string {
    return `Formula "${this.formula}" is already registered`
  }
}

/**
 * Raised when a registration passes configuration options the formula does
 * not declare.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnrecognizedOptionError extends Data.TaggedError("UnrecognizedOptionError")<{
  readonly formula: string
  readonly options: ReadonlyArray<string>
  readonly recognized: ReadonlyArray<string>
}> {
  override get message(): string {
    const accepted = this.recognized.length === 0 ? "none" : this.recognized.join(", ")
    return `Formula "${this.formula}" does not recognize options: ${this.options.join(", ")} (accepted: ${accepted})`
  }
}

/**
 * Raised when an input is declared both required and optional.
 *
 * @category Errors
 * @since 0.1.0
 */
export class OverlappingInputsError extends Data.TaggedError("OverlappingInputsError")<{
  readonly formula: string
  readonly inputs: ReadonlyArray<string>
}> {
  override get message(): string {
    return `Formula "${this.formula}" declares inputs as both required and optional: ${this.inputs.join(", ")}`
  }
}

/**
 * Setup-time failures raised by the registry.
 *
 * @category Errors
 * @since 0.1.0
 */
export type RegistrationError = DuplicateFormulaError | UnrecognizedOptionError | OverlappingInputsError

/**
 * Raised when a formula name is not in the registry.
 *
 * @category Errors
 * @since 0.1.0
 */
export class FormulaNotFoundError extends Data.TaggedError("FormulaNotFoundError")<{
  readonly formula: string
}> {
  override get message(): string {
    return `Formula "${this.formula}" is not registered`
  }
}

/**
 * Raised by single-formula runs when the dataset lacks required inputs.
 *
 * @category Errors
 * @since 0.1.0
 */
export class MissingInputsError extends Data.TaggedError("MissingInputsError")<{
  readonly formula: FormulaName
  readonly missing: ReadonlyArray<string>
}> {
  override get message(): string {
    return `Formula "${this.formula}" cannot run, missing: ${this.missing.join(", ")}`
  }
}

/**
 * A formula raised, or returned an output the engine cannot accept.
 *
 * @category Errors
 * @since 0.1.0
 */
export class FormulaExecutionError extends Data.TaggedError("FormulaExecutionError")<{
  readonly formula: FormulaName
  readonly problem: string
}> {
  override get message(): string {
    return `Formula "${this.formula}" failed: ${this.problem}`
  }
}

/**
 * Raised when dataset input does not satisfy the dataset shape.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DatasetValidationError extends Data.TaggedError("DatasetValidationError")<{
  readonly problem: string
}> {
  override get message(): string {
    return `Invalid forcing dataset: ${this.problem}`
  }
}

/**
 * Failures of single-formula runs.
 *
 * @category Errors
 * @since 0.1.0
 */
export type RunOneError = FormulaNotFoundError | MissingInputsError | FormulaExecutionError

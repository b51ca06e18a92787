import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  DatasetValidationError,
  DuplicateFormulaError,
  FormulaExecutionError,
  FormulaNotFoundError,
  MissingInputsError,
  UnrecognizedOptionError,
} from "../src/Errors.js"
import { FormulaName } from "../src/Types.js"

describe("engine error hierarchy", () => {
  it("formats registration errors", () => {
    expect(new DuplicateFormulaError({ formula: "PM" }).message).toBe('Formula "PM" is already registered')
    expect(new UnrecognizedOptionError({ formula: "PM", options: ["beta"], recognized: [] }).message).toBe(
      'Formula "PM" does not recognize options: beta (accepted: none)',
    )
  })

  it("formats run errors", () => {
    const formula = FormulaName.make("PT-JPL")

    expect(new FormulaNotFoundError({ formula: "PT-JPL" }).message).toBe('Formula "PT-JPL" is not registered')
    expect(new MissingInputsError({ formula, missing: ["lai", "co2"] }).message).toBe(
      'Formula "PT-JPL" cannot run, missing: lai, co2',
    )
    expect(new FormulaExecutionError({ formula, problem: "boom" }).message).toBe('Formula "PT-JPL" failed: boom')
    expect(new DatasetValidationError({ problem: "empty" }).message).toBe("Invalid forcing dataset: empty")
  })

  it.effect("supports catchTag on MissingInputsError", () =>
    Effect.gen(function* () {
      const handled = yield* Effect.fail(
        new MissingInputsError({ formula: FormulaName.make("PML"), missing: ["lai"] }),
      ).pipe(
        Effect.catchTag("MissingInputsError", (error) => Effect.succeed(error.missing.join(","))),
      )

      expect(handled).toBe("lai")
    }))
})

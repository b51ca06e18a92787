/**
 * Formula registry.
 *
 * Holds formula descriptors in registration order. The catalog lives as long
 * as the layer that built it; two layers never share state.
 *
 * @since 0.1.0
 */

import { Context, Effect, Either, Layer, Option, Ref } from "effect"
import { builtinFormulas } from "./Catalog.js"
import type { RegistrationError } from "./Errors.js"
import {
  DuplicateFormulaError,
  FormulaNotFoundError,
  OverlappingInputsError,
  UnrecognizedOptionError,
} from "./Errors.js"
import type { FormulaSpec } from "./Formula.js"
import { withParameters } from "./Formula.js"
import type { AlgorithmFamily } from "./Types.js"

/**
 * Per-registration option overrides, keyed by parameter name.
 *
 * @category Registry
 * @since 0.1.0
 */
export type FormulaOptions = Readonly<Record<string, number>>

/**
 * @category Registry
 * @since 0.1.0
 */
export interface FormulaRegistryService {
  /** Add a formula. Succeeds with the spec as configured by `options`. */
  readonly register: (
    spec: FormulaSpec,
    options?: FormulaOptions,
  ) => Effect.Effect<FormulaSpec, RegistrationError>
  readonly allSpecs: Effect.Effect<ReadonlyArray<FormulaSpec>>
  readonly specsByFamily: (family: AlgorithmFamily) => Effect.Effect<ReadonlyArray<FormulaSpec>>
  readonly get: (name: string) => Effect.Effect<FormulaSpec, FormulaNotFoundError>
  readonly names: Effect.Effect<ReadonlyArray<string>>
}

/**
 * Validate `spec` against `existing` and apply `options`. Pure, so `register`
 * can check and append in one atomic update.
 *
 * @category Registry
 * @since 0.1.0
 */
export const configure = (
  existing: ReadonlyArray<FormulaSpec>,
  spec: FormulaSpec,
  options: FormulaOptions = {},
): Either.Either<FormulaSpec, RegistrationError> => {
  if (existing.some((candidate) => candidate.name === spec.name)) {
    return Either.left(new DuplicateFormulaError({ formula: spec.name }))
  }

  const overlap = spec.required.filter((input) => Object.hasOwn(spec.optional, input))
  if (overlap.length > 0) {
    return Either.left(new OverlappingInputsError({ formula: spec.name, inputs: overlap }))
  }

  const recognized = Object.keys(spec.parameters)
  const unknown = Object.keys(options).filter((key) => !recognized.includes(key))
  if (unknown.length > 0) {
    return Either.left(new UnrecognizedOptionError({ formula: spec.name, options: unknown, recognized }))
  }

  return Either.right(Object.keys(options).length === 0 ? spec : withParameters(spec, options))
}

const findSpec = (specs: ReadonlyArray<FormulaSpec>, name: string): Option.Option<FormulaSpec> =>
  Option.fromNullable(specs.find((spec) => spec.name === name))

/**
 * Build a registry service over a fresh catalog seeded with `initial`.
 *
 * @category Registry
 * @since 0.1.0
 */
export const makeFormulaRegistry = (
  initial: ReadonlyArray<FormulaSpec> = [],
): Effect.Effect<FormulaRegistryService, RegistrationError> =>
  Effect.gen(function* () {
    const seeded: Array<FormulaSpec> = []
    for (const spec of initial) {
      seeded.push(yield* configure(seeded, spec))
    }
    const specsRef = yield* Ref.make<ReadonlyArray<FormulaSpec>>(seeded)
    const allSpecs = Ref.get(specsRef)

    const register = (spec: FormulaSpec, options?: FormulaOptions) =>
      Effect.gen(function* () {
        const outcome = yield* Ref.modify(specsRef, (specs) => {
          const checked = configure(specs, spec, options)
          return [checked, Either.isRight(checked) ? [...specs, checked.right] : specs] as const
        })
        const configured = yield* outcome
        yield* Effect.logDebug("formula registered").pipe(Effect.annotateLogs("formula", configured.name))
        return configured
      })

    const service: FormulaRegistryService = {
      register,
      allSpecs,
      specsByFamily: (family) =>
        Effect.map(allSpecs, (specs) => specs.filter((spec) => spec.family === family)),
      get: (name) =>
        Effect.flatMap(allSpecs, (specs) =>
          Option.match(findSpec(specs, name), {
            onNone: () => Effect.fail(new FormulaNotFoundError({ formula: name })),
            onSome: Effect.succeed,
          })),
      names: Effect.map(allSpecs, (specs) => specs.map((spec) => spec.name)),
    }

    return service
  })

/**
 * @category Services
 * @since 0.1.0
 */
export class FormulaRegistry extends Context.Tag("et-intercompare/FormulaRegistry")<
  FormulaRegistry,
  FormulaRegistryService
>() {
  /** Registry seeded with `initial`. Fails at build time on an invalid seed. */
  static layer(initial: ReadonlyArray<FormulaSpec> = []) {
    return Layer.effect(this, makeFormulaRegistry(initial))
  }

  /** Registry seeded with the built-in catalog. */
  static readonly Default = Layer.effect(this, makeFormulaRegistry(builtinFormulas))
}

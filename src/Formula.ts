/**
 * Formula descriptors.
 *
 * A formula is a pure function from named inputs (dataset series, or the
 * scalar default of an absent optional input) and configuration parameters
 * to either a single series or a record of named series carrying `total`.
 * Descriptors are plain immutable records; the registry validates them.
 *
 * Formula bodies stay plain TypeScript. Effect is for orchestration, not
 * arithmetic.
 *
 * @since 0.1.0
 */

import type { AlgorithmFamily, FormulaName as FormulaNameType, Series } from "./Types.js"
import { FormulaName } from "./Types.js"

/**
 * A single formula argument: a series aligned with the dataset, or a scalar.
 *
 * @category Formulas
 * @since 0.1.0
 */
export type FormulaInput = number | Series

/**
 * @category Formulas
 * @since 0.1.0
 */
export type FormulaInputs<K extends string> = { readonly [P in K]: FormulaInput }

/**
 * @category Formulas
 * @since 0.1.0
 */
export type FormulaParameters<K extends string> = { readonly [P in K]: number }

/**
 * Output carrying named sub-fluxes. `total` is mandatory.
 *
 * @category Formulas
 * @since 0.1.0
 */
export type ComponentOutput = { readonly total: FormulaInput } & {
  readonly [component: string]: FormulaInput
}

/**
 * @category Formulas
 * @since 0.1.0
 */
export type FormulaOutput = FormulaInput | ComponentOutput

/**
 * Static descriptor held by the registry.
 *
 * @category Formulas
 * @since 0.1.0
 */
export interface FormulaSpec<R extends string = string, O extends string = string, P extends string = string> {
  readonly name: FormulaNameType
  readonly family: AlgorithmFamily
  readonly description: string
  /** Inputs that must be present in the dataset. */
  readonly required: ReadonlyArray<R>
  /** Inputs used when present, replaced by their default otherwise. */
  readonly optional: { readonly [K in O]: number }
  /** Recognized configuration options and their current values. */
  readonly parameters: FormulaParameters<P>
  /** Sub-fluxes that add up to `total`. Empty when the formula does not partition. */
  readonly components: ReadonlyArray<string>
  readonly supportsPartition: boolean
  compute(inputs: FormulaInputs<R | O>, parameters: FormulaParameters<P>): FormulaOutput
}

interface DefinitionBase<R extends string, O extends string, P extends string> {
  readonly name: string
  readonly family: AlgorithmFamily
  readonly description?: string
  readonly required: ReadonlyArray<R>
  readonly optional?: { readonly [K in O]: number }
  readonly parameters?: FormulaParameters<P>
  readonly components?: ReadonlyArray<string>
}

/**
 * @category Formulas
 * @since 0.1.0
 */
export interface FormulaDefinition<R extends string, O extends string, P extends string>
  extends DefinitionBase<R, O, P>
{
  readonly compute: (inputs: FormulaInputs<R | O>, parameters: FormulaParameters<P>) => FormulaOutput
}

/**
 * Value produced for one timestep by a pointwise body.
 *
 * @category Formulas
 * @since 0.1.0
 */
export type PointOutput = number | ({ readonly total: number } & { readonly [component: string]: number })

/**
 * @category Formulas
 * @since 0.1.0
 */
export type PointwiseBody<K extends string, P extends string> = (
  at: (input: K) => number,
  parameters: FormulaParameters<P>,
) => PointOutput

/**
 * @category Formulas
 * @since 0.1.0
 */
export interface PointwiseDefinition<R extends string, O extends string, P extends string>
  extends DefinitionBase<R, O, P>
{
  readonly evaluate: PointwiseBody<R | O, P>
}

const emptyRecord = <K extends string>(): { readonly [P in K]: number } => Object.freeze(Object.create(null))

/**
 * Build a descriptor from a vectorized body.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const equilibrium = defineFormula({
 *   name: "EQ",
 *   family: "radiation-based",
 *   required: ["net_radiation"],
 *   compute: ({ net_radiation }) => mapInput(net_radiation, (rn) => rn / 2.45),
 * })
 * ```
 */
export const defineFormula = <R extends string, O extends string = never, P extends string = never>(
  definition: FormulaDefinition<R, O, P>,
): FormulaSpec<R, O, P> => {
  const components = Object.freeze([...(definition.components ?? [])])
  const compute = definition.compute
  return Object.freeze({
    name: FormulaName.make(definition.name),
    family: definition.family,
    description: definition.description ?? "",
    required: Object.freeze([...definition.required]),
    optional: Object.freeze({ ...(definition.optional ?? emptyRecord<O>()) }),
    parameters: Object.freeze({ ...(definition.parameters ?? emptyRecord<P>()) }),
    components,
    supportsPartition: components.length > 0,
    compute: (inputs: FormulaInputs<R | O>, parameters: FormulaParameters<P>) => compute(inputs, parameters),
  })
}

/**
 * Build a descriptor from a body evaluated once per timestep. Scalar
 * arguments are broadcast; series arguments must share one length.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const definePointwiseFormula = <R extends string, O extends string = never, P extends string = never>(
  definition: PointwiseDefinition<R, O, P>,
): FormulaSpec<R, O, P> => {
  const { evaluate, ...rest } = definition
  return defineFormula<R, O, P>({ ...rest, compute: pointwise(evaluate, definition.components) })
}

/**
 * Return a copy of `spec` whose parameters are overridden by `options`. Keys
 * are not checked here; the registry rejects unknown ones.
 *
 * @category Combinators
 * @since 0.1.0
 */
export const withParameters = (spec: FormulaSpec, options: Readonly<Record<string, number>>): FormulaSpec =>
  Object.freeze({
    ...spec,
    parameters: Object.freeze({ ...spec.parameters, ...options }),
  })

/**
 * Length shared by the series among `inputs`, or `undefined` when every input
 * is a scalar.
 *
 * @category Series
 * @since 0.1.0
 */
export const commonLength = (inputs: ReadonlyArray<FormulaInput>): number | undefined => {
  let length: number | undefined
  for (const input of inputs) {
    if (typeof input === "number") {
      continue
    }
    if (length === undefined) {
      length = input.length
    } else if (input.length !== length) {
      throw new RangeError(`input series lengths differ: ${length} vs ${input.length}`)
    }
  }
  return length
}

/**
 * @category Series
 * @since 0.1.0
 */
export const valueAt = (input: FormulaInput, index: number): number =>
  typeof input === "number" ? input : input[index] ?? Number.NaN

/**
 * Apply `f` to every element of a series, or to the scalar itself.
 *
 * @category Series
 * @since 0.1.0
 */
export const mapInput = (input: FormulaInput, f: (value: number) => number): FormulaInput =>
  typeof input === "number" ? f(input) : input.map(f)

const emptyColumns = (components: ReadonlyArray<string>): FormulaOutput => {
  const columns: Record<string, ReadonlyArray<number>> = {}
  for (const name of components) {
    columns[name] = []
  }
  return { ...columns, total: [] }
}

const collectColumns = (points: ReadonlyArray<PointOutput>, components: ReadonlyArray<string>): FormulaOutput => {
  const first = points[0]
  if (first === undefined && components.length > 0) {
    return emptyColumns(components)
  }
  if (first === undefined || typeof first === "number") {
    return points.map((point) => {
      if (typeof point !== "number") {
        throw new TypeError("formula mixed scalar and component outputs")
      }
      return point
    })
  }

  const keys = Object.keys(first)
  const columns: Record<string, Array<number>> = {}
  for (const key of keys) {
    columns[key] = []
  }
  for (const point of points) {
    if (typeof point === "number") {
      throw new TypeError("formula mixed scalar and component outputs")
    }
    for (const key of keys) {
      const value = point[key]
      const column = columns[key]
      if (value === undefined || column === undefined) {
        throw new TypeError(`component "${key}" missing at some timesteps`)
      }
      column.push(value)
    }
  }

  const total = columns["total"]
  if (total === undefined) {
    throw new TypeError("component output has no total")
  }
  return { ...columns, total }
}

/**
 * Lift a per-timestep body into a vectorized `compute` function. On an empty
 * time axis the body never runs and the output is an empty `total` plus an
 * empty series for each of `components`.
 *
 * @category Series
 * @since 0.1.0
 */
export const pointwise = <K extends string, P extends string>(
  body: PointwiseBody<K, P>,
  components: ReadonlyArray<string> = [],
) =>
  (inputs: FormulaInputs<K>, parameters: FormulaParameters<P>): FormulaOutput => {
    const values: ReadonlyArray<FormulaInput> = Object.values(inputs)
    const length = commonLength(values)
    if (length === undefined) {
      return body((input) => valueAt(inputs[input], 0), parameters)
    }
    const points: Array<PointOutput> = []
    for (let index = 0; index < length; index += 1) {
      points.push(body((input) => valueAt(inputs[input], index), parameters))
    }
    return collectColumns(points, components)
  }

/**
 * Forcing datasets.
 *
 * A dataset is an ordered time axis plus named numeric series of the same
 * length. Missing values are `NaN`. Once made, a dataset is never mutated;
 * `select` and `without` return new datasets.
 *
 * @since 0.1.0
 */

import { Effect, Option, Schema } from "effect"
import { DatasetValidationError } from "./Errors.js"
import type { Series } from "./Types.js"
import { isKnownVariable, VariableName } from "./Types.js"

const shapeProblem = (
  timestamps: ReadonlyArray<Date>,
  variables: Readonly<Record<string, Series>>,
): string | undefined => {
  for (const [name, values] of Object.entries(variables)) {
    if (values.length !== timestamps.length) {
      return `variable "${name}" has ${values.length} values for ${timestamps.length} timestamps`
    }
  }
  for (let index = 1; index < timestamps.length; index += 1) {
    const previous = timestamps[index - 1]
    const current = timestamps[index]
    if (previous !== undefined && current !== undefined && current.getTime() <= previous.getTime()) {
      return `timestamps must be strictly increasing (index ${index}: ${current.toISOString()})`
    }
  }
  return undefined
}

/**
 * Every series has one value per timestamp and timestamps strictly increase,
 * whichever way the dataset is constructed.
 *
 * @category Models
 * @since 0.1.0
 */
export class ForcingDataset extends Schema.Class<ForcingDataset>("ForcingDataset")(
  Schema.Struct({
    timestamps: Schema.Array(Schema.ValidDateFromSelf),
    variables: Schema.Record({ key: VariableName, value: Schema.Array(Schema.Number) }),
  }).pipe(Schema.filter(({ timestamps, variables }) => shapeProblem(timestamps, variables))),
) {
  /** Number of timesteps. */
  get length(): number {
    return this.timestamps.length
  }

  get variableNames(): ReadonlyArray<string> {
    return Object.keys(this.variables)
  }

  has(name: string): boolean {
    return Object.hasOwn(this.variables, name)
  }

  series(name: string): Option.Option<Series> {
    return this.has(name) ? Option.fromNullable(this.variables[name]) : Option.none()
  }

  /** Keep only the listed variables. Unknown names are ignored. */
  select(names: Iterable<string>): ForcingDataset {
    const keep = new Set(names)
    return this.filterVariables((name) => keep.has(name))
  }

  /** Drop the listed variables. */
  without(names: Iterable<string>): ForcingDataset {
    const drop = new Set(names)
    return this.filterVariables((name) => !drop.has(name))
  }

  private filterVariables(predicate: (name: string) => boolean): ForcingDataset {
    const variables: Record<string, Series> = {}
    for (const [name, values] of Object.entries(this.variables)) {
      if (predicate(name)) {
        variables[name] = values
      }
    }
    return new ForcingDataset({ timestamps: this.timestamps, variables }, true)
  }
}

const TimestampInput = Schema.Union(Schema.ValidDateFromSelf, Schema.Date, Schema.DateFromNumber)

const Cell = Schema.transform(Schema.NullOr(Schema.Number), Schema.Number, {
  strict: true,
  decode: (value) => value ?? Number.NaN,
  encode: (value) => (Number.isNaN(value) ? null : value),
})

/**
 * Shape accepted by {@link makeDataset}. Timestamps may be `Date` values, ISO
 * strings or epoch milliseconds; `null` cells decode to `NaN`.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const DatasetInput = Schema.Struct({
  timestamps: Schema.Array(TimestampInput),
  variables: Schema.Record({ key: VariableName, value: Schema.Array(Cell) }),
})

/**
 * @category Schemas
 * @since 0.1.0
 */
export type DatasetInput = typeof DatasetInput.Encoded

/**
 * Decode and validate a dataset.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const dataset = yield* makeDataset({
 *   timestamps: ["2020-06-01", "2020-06-02"],
 *   variables: { temperature: [20, 22], net_radiation: [15, 18] },
 * })
 * ```
 */
export const makeDataset = (input: unknown): Effect.Effect<ForcingDataset, DatasetValidationError> =>
  Effect.gen(function* () {
    const decoded = yield* Schema.decodeUnknown(DatasetInput)(input).pipe(
      Effect.mapError((error) => new DatasetValidationError({ problem: error.message })),
    )
    const problem = shapeProblem(decoded.timestamps, decoded.variables)
    if (problem !== undefined) {
      return yield* Effect.fail(new DatasetValidationError({ problem }))
    }

    const variables: Record<string, Series> = {}
    for (const [name, values] of Object.entries(decoded.variables)) {
      variables[name] = Object.freeze([...values])
    }

    const unknown = Object.keys(variables).filter((name) => !isKnownVariable(name))
    if (unknown.length > 0) {
      yield* Effect.logDebug("dataset carries variables outside the known vocabulary").pipe(
        Effect.annotateLogs("variables", unknown.join(",")),
      )
    }

    // validated above
    return new ForcingDataset(
      {
        timestamps: Object.freeze(decoded.timestamps.map((date) => new Date(date.getTime()))),
        variables,
      },
      true,
    )
  })

/**
 * Row shape accepted by {@link fromRecords}.
 *
 * @category Constructors
 * @since 0.1.0
 */
export interface DatasetRow {
  readonly timestamp: Date | string | number
  readonly [variable: string]: Date | string | number | null | undefined
}

/**
 * Build a dataset from row objects. A variable absent from some rows is `NaN`
 * in those rows.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const fromRecords = (
  rows: ReadonlyArray<DatasetRow>,
): Effect.Effect<ForcingDataset, DatasetValidationError> => {
  const names: Array<string> = []
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (key !== "timestamp" && !names.includes(key)) {
        names.push(key)
      }
    }
  }
  const variables: Record<string, Array<unknown>> = {}
  for (const name of names) {
    variables[name] = rows.map((row) => row[name] ?? null)
  }
  return makeDataset({ timestamps: rows.map((row) => row.timestamp), variables })
}

import { Either } from "effect"
import type { Series } from "../Types.js"

/** @internal */
export interface NormalizedOutput {
  readonly total: Series
  readonly components: Readonly<Record<string, Series>>
}

const isInfinite = (value: number): boolean => value === Infinity || value === -Infinity

/** @internal */
export const toSeries = (value: unknown, length: number, label: string): Either.Either<Series, string> => {
  if (typeof value === "number") {
    return isInfinite(value)
      ? Either.left(`${label} is not finite`)
      : Either.right(Object.freeze(Array.from({ length }, () => value)))
  }
  if (!Array.isArray(value)) {
    return Either.left(`${label} is not a number or numeric series`)
  }
  const items: ReadonlyArray<unknown> = value
  if (items.length !== length) {
    return Either.left(`${label} has ${items.length} values, expected ${length}`)
  }
  const series: Array<number> = []
  for (const item of items) {
    if (typeof item !== "number") {
      return Either.left(`${label} contains a non-numeric value`)
    }
    if (isInfinite(item)) {
      return Either.left(`${label} contains non-finite values`)
    }
    series.push(item)
  }
  return Either.right(Object.freeze(series))
}

/**
 * Validate a formula's raw output against the time axis. Scalars are
 * broadcast, records must carry `total`, `NaN` passes, `±Infinity` does not.
 *
 * @internal
 */
export const normalizeOutput = (output: unknown, length: number): Either.Either<NormalizedOutput, string> => {
  if (typeof output !== "object" || output === null || Array.isArray(output)) {
    return Either.map(toSeries(output, length, "output"), (total) => ({ total, components: {} }))
  }

  const fields: ReadonlyArray<readonly [string, unknown]> = Object.entries(output)
  let total: Series | undefined
  const components: Record<string, Series> = {}
  for (const [name, value] of fields) {
    const series = toSeries(value, length, `component "${name}"`)
    if (Either.isLeft(series)) {
      return Either.left(series.left)
    }
    if (name === "total") {
      total = series.right
    } else {
      components[name] = series.right
    }
  }
  if (total === undefined) {
    return Either.left("output has no total")
  }
  return Either.right({ total, components })
}

import type { Series } from "../Types.js"

/** @internal */
export interface Description {
  readonly count: number
  readonly mean: number
  readonly std: number
  readonly cv: number
  readonly min: number
  readonly p25: number
  readonly median: number
  readonly p75: number
  readonly max: number
}

/** @internal */
export const present = (series: Series): ReadonlyArray<number> => series.filter((value) => !Number.isNaN(value))

/** @internal */
export const mean = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return Number.NaN
  }
  let sum = 0
  for (const value of values) {
    sum += value
  }
  return sum / values.length
}

/**
 * Sample standard deviation (n - 1 denominator). `NaN` below two values.
 *
 * @internal
 */
export const sampleStd = (values: ReadonlyArray<number>): number => {
  if (values.length < 2) {
    return Number.NaN
  }
  const centre = mean(values)
  let squares = 0
  for (const value of values) {
    squares += (value - centre) ** 2
  }
  return Math.sqrt(squares / (values.length - 1))
}

/**
 * Linearly interpolated quantile of ascending `sorted` values, `q` in [0, 1].
 * `NaN` when there are no values.
 *
 * @internal
 */
export const quantile = (sorted: ReadonlyArray<number>, q: number): number => {
  if (sorted.length === 0) {
    return Number.NaN
  }
  const index = (sorted.length - 1) * Math.min(1, Math.max(0, q))
  const lower = Math.floor(index)
  const upper = Math.ceil(index)
  const lowerValue = sorted[lower] ?? Number.NaN
  const upperValue = sorted[upper] ?? Number.NaN
  return lower === upper ? lowerValue : lowerValue + (upperValue - lowerValue) * (index - lower)
}

/** @internal */
export const describe = (series: Series): Description => {
  const values = present(series)
  if (values.length === 0) {
    return {
      count: 0,
      mean: Number.NaN,
      std: Number.NaN,
      cv: Number.NaN,
      min: Number.NaN,
      p25: Number.NaN,
      median: Number.NaN,
      p75: Number.NaN,
      max: Number.NaN,
    }
  }
  const centre = mean(values)
  const std = sampleStd(values)
  const sorted = [...values].sort((a, b) => a - b)
  return {
    count: values.length,
    mean: centre,
    std,
    cv: centre === 0 ? Number.NaN : std / centre,
    min: sorted[0] ?? Number.NaN,
    p25: quantile(sorted, 0.25),
    median: quantile(sorted, 0.5),
    p75: quantile(sorted, 0.75),
    max: sorted[sorted.length - 1] ?? Number.NaN,
  }
}

/**
 * Values of `a` and `b` at the positions where neither is `NaN`.
 *
 * @internal
 */
export const pairwiseComplete = (
  a: Series,
  b: Series,
): readonly [ReadonlyArray<number>, ReadonlyArray<number>] => {
  const xs: Array<number> = []
  const ys: Array<number> = []
  const length = Math.min(a.length, b.length)
  for (let index = 0; index < length; index += 1) {
    const x = a[index] ?? Number.NaN
    const y = b[index] ?? Number.NaN
    if (!Number.isNaN(x) && !Number.isNaN(y)) {
      xs.push(x)
      ys.push(y)
    }
  }
  return [xs, ys]
}

/**
 * Pearson coefficient over pairwise-complete points, clamped to [-1, 1].
 * `NaN` with fewer than two points or a constant side.
 *
 * @internal
 */
export const pearson = (a: Series, b: Series): number => {
  const [xs, ys] = pairwiseComplete(a, b)
  if (xs.length < 2) {
    return Number.NaN
  }
  const mx = mean(xs)
  const my = mean(ys)
  let sxy = 0
  let sxx = 0
  let syy = 0
  xs.forEach((x, index) => {
    const dx = x - mx
    const dy = (ys[index] ?? my) - my
    sxy += dx * dy
    sxx += dx * dx
    syy += dy * dy
  })
  if (sxx === 0 || syy === 0) {
    return Number.NaN
  }
  return Math.min(1, Math.max(-1, sxy / Math.sqrt(sxx * syy)))
}

/**
 * Mean of `|a - b|` over pairwise-complete points. `NaN` with none.
 *
 * @internal
 */
export const meanAbsoluteDifference = (a: Series, b: Series): number => {
  const [xs, ys] = pairwiseComplete(a, b)
  return mean(xs.map((x, index) => Math.abs(x - (ys[index] ?? x))))
}

/** True when the series has at least two present values that differ. */
export const varies = (series: Series): boolean => {
  const values = present(series)
  return values.length >= 2 && values.some((value) => value !== values[0])
}

/**
 * Square matrix filled from the upper triangle and mirrored, so symmetry does
 * not depend on floating point commutativity.
 *
 * @internal
 */
export const symmetricMatrix = (
  size: number,
  diagonal: (index: number) => number,
  offDiagonal: (row: number, col: number) => number,
): ReadonlyArray<ReadonlyArray<number>> => {
  const rows: Array<Array<number>> = Array.from({ length: size }, () => new Array<number>(size).fill(Number.NaN))
  for (let row = 0; row < size; row += 1) {
    const cells = rows[row]
    if (cells === undefined) {
      continue
    }
    cells[row] = diagonal(row)
    for (let col = row + 1; col < size; col += 1) {
      const value = offDiagonal(row, col)
      cells[col] = value
      const mirror = rows[col]
      if (mirror !== undefined) {
        mirror[row] = value
      }
    }
  }
  return rows
}

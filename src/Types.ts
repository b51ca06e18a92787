/**
 * Type Foundations
 *
 * Branded names and literal vocabularies shared across the engine. Formula
 * names are branded so a variable name can never be passed where a formula
 * name is expected.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Branded, non-empty formula identifier (e.g. `"PM"`, `"PT-JPL"`).
 *
 * @since 0.1.0
 * @category Names
 */
export const FormulaName = Schema.NonEmptyTrimmedString.pipe(Schema.brand("FormulaName"))

/**
 * @since 0.1.0
 * @category Names
 */
export type FormulaName = typeof FormulaName.Type

/**
 * Forcing variable identifier. Case-sensitive snake_case.
 *
 * @since 0.1.0
 * @category Names
 */
export const VariableName = Schema.String.pipe(
  Schema.pattern(/^[a-z][a-z0-9_]*$/),
  Schema.annotations({ identifier: "VariableName" }),
)

/**
 * @since 0.1.0
 * @category Names
 */
export type VariableName = typeof VariableName.Type

/**
 * Variables the built-in catalog understands. Datasets may carry others.
 *
 * @since 0.1.0
 * @category Names
 */
export const KNOWN_VARIABLES = [
  "temperature",
  "tmax",
  "tmin",
  "relative_humidity",
  "wind_speed",
  "net_radiation",
  "soil_heat_flux",
  "pressure",
  "lai",
  "ndvi",
  "co2",
  "vpd",
  "soil_moisture",
  "doy",
  "latitude",
] as const

/**
 * @since 0.1.0
 * @category Names
 */
export type KnownVariable = (typeof KNOWN_VARIABLES)[number]

const knownVariables: ReadonlySet<string> = new Set(KNOWN_VARIABLES)

/**
 * @since 0.1.0
 * @category Names
 */
export const isKnownVariable = (name: string): name is KnownVariable => knownVariables.has(name)

/**
 * Algorithm family a formula belongs to.
 *
 * @since 0.1.0
 * @category Families
 */
export const AlgorithmFamily = Schema.Literal(
  "temperature-based",
  "radiation-based",
  "combination",
  "co2-aware",
  "vegetation-aware",
  "complementary-relationship",
)

/**
 * @since 0.1.0
 * @category Families
 */
export type AlgorithmFamily = typeof AlgorithmFamily.Type

/**
 * A numeric time series aligned with a dataset's timestamps.
 *
 * @since 0.1.0
 */
export type Series = ReadonlyArray<number>

/**
 * Built-in formula catalog.
 *
 * Inputs are daily values: temperature in °C, relative humidity in %, wind
 * speed at 2 m in m s-1, radiation and soil heat flux in MJ m-2 day-1,
 * pressure in kPa, CO2 in ppm, soil moisture in m3 m-3. Outputs are
 * mm day-1.
 *
 * @since 0.1.0
 */

import type { FormulaSpec } from "./Formula.js"
import { penmanMonteithCo2, penmanMonteithCo2Lai } from "./internal/formulas/co2.js"
import { penmanMonteith, penmanOpenWater } from "./internal/formulas/combination.js"
import {
  advectionAridity,
  bouchet,
  grangerGray,
  nonlinearComplementary,
} from "./internal/formulas/complementary.js"
import { priestleyTaylor, priestleyTaylorAdvection } from "./internal/formulas/radiation.js"
import { hargreaves } from "./internal/formulas/temperature.js"
import {
  penmanMonteithLeuning,
  pmlV2,
  priestleyTaylorJpl,
  priestleyTaylorJplPartition,
} from "./internal/formulas/vegetation.js"

export {
  advectionAridity,
  bouchet,
  grangerGray,
  hargreaves,
  nonlinearComplementary,
  penmanMonteith,
  penmanMonteithCo2,
  penmanMonteithCo2Lai,
  penmanMonteithLeuning,
  penmanOpenWater,
  pmlV2,
  priestleyTaylor,
  priestleyTaylorAdvection,
  priestleyTaylorJpl,
  priestleyTaylorJplPartition,
}

/**
 * Every built-in formula in registration order.
 *
 * @category Catalog
 * @since 0.1.0
 */
export const builtinFormulas: ReadonlyArray<FormulaSpec> = [
  penmanMonteith,
  priestleyTaylor,
  priestleyTaylorJpl,
  penmanMonteithLeuning,
  penmanMonteithCo2,
  penmanMonteithCo2Lai,
  bouchet,
  advectionAridity,
  grangerGray,
  priestleyTaylorAdvection,
  nonlinearComplementary,
  pmlV2,
  priestleyTaylorJplPartition,
  hargreaves,
  penmanOpenWater,
]

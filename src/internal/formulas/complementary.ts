import { definePointwiseFormula } from "../../Formula.js"
import { ALPHA_PT, LATENT_HEAT, RHO_CP, SURFACE_DEFAULTS } from "./constants.js"
import {
  aerodynamicResistance,
  energyTerms,
  nonNegative,
  saturationVapourPressure,
  vapourPressureDeficit,
} from "./meteorology.js"

const CR_REQUIRED = ["temperature", "relative_humidity", "net_radiation"] as const

/** Bouchet's complementary relationship; `total` is the potential rate. */
export const bouchet = definePointwiseFormula({
  name: "CR-Bouchet",
  family: "complementary-relationship",
  description: "Bouchet complementary relationship (potential = 1.26 wet-environment rate)",
  required: CR_REQUIRED,
  optional: SURFACE_DEFAULTS,
  evaluate: (at) => {
    const temperature = at("temperature")
    const { aerodynamicWeight, radiativeWeight } = energyTerms(temperature, at("pressure"))
    const wet = (radiativeWeight * (at("net_radiation") - at("soil_heat_flux"))) / LATENT_HEAT
    const dryingPower = aerodynamicWeight * vapourPressureDeficit(temperature, at("relative_humidity")) * 6.43
    return {
      total: nonNegative(ALPHA_PT * wet),
      wet_environment: nonNegative(wet),
      apparent_potential: nonNegative(wet + dryingPower),
    }
  },
})

/** Brutsaert-Stricker advection-aridity model; `total` is the potential rate. */
export const advectionAridity = definePointwiseFormula({
  name: "CR-AA",
  family: "complementary-relationship",
  description: "Advection-aridity complementary model",
  required: ["temperature", "relative_humidity", "wind_speed", "net_radiation"],
  optional: SURFACE_DEFAULTS,
  evaluate: (at) => {
    const temperature = at("temperature")
    const { aerodynamicWeight, radiativeWeight } = energyTerms(temperature, at("pressure"))
    const wet = (radiativeWeight * (at("net_radiation") - at("soil_heat_flux"))) / LATENT_HEAT
    const vpd = vapourPressureDeficit(temperature, at("relative_humidity"))
    const aerodynamic = (RHO_CP * vpd) / aerodynamicResistance(at("wind_speed")) / LATENT_HEAT
    return {
      total: nonNegative(wet + aerodynamicWeight * aerodynamic),
      equilibrium: nonNegative(wet),
      aridity_index: vpd / (saturationVapourPressure(temperature) + 1e-6),
    }
  },
})

/** Granger-Gray relative evaporation applied to equilibrium evaporation. */
export const grangerGray = definePointwiseFormula({
  name: "CR-GG",
  family: "complementary-relationship",
  description: "Granger-Gray complementary model",
  required: CR_REQUIRED,
  optional: SURFACE_DEFAULTS,
  evaluate: (at) => {
    const temperature = at("temperature")
    const { radiativeWeight } = energyTerms(temperature, at("pressure"))
    const equilibrium = (radiativeWeight * (at("net_radiation") - at("soil_heat_flux"))) / LATENT_HEAT
    const vpd = vapourPressureDeficit(temperature, at("relative_humidity"))
    const relative = vpd > 0 ? 1 / (1 + vpd / 0.07) : 1
    return nonNegative(relative * equilibrium)
  },
})

/** Nonlinear complementary relationship with exponent b = 2; `total` is the actual rate. */
export const nonlinearComplementary = definePointwiseFormula({
  name: "CR-nonlinear",
  family: "complementary-relationship",
  description: "Nonlinear complementary relationship driven by relative humidity",
  required: CR_REQUIRED,
  optional: SURFACE_DEFAULTS,
  evaluate: (at) => {
    const { radiativeWeight } = energyTerms(at("temperature"), at("pressure"))
    const wet = (ALPHA_PT * radiativeWeight * (at("net_radiation") - at("soil_heat_flux"))) / LATENT_HEAT
    const dryness = 1 - at("relative_humidity") / 100
    const relative = Math.sqrt(1 - dryness ** 2)
    const actual = wet * relative
    return {
      total: nonNegative(actual),
      wet_surface: nonNegative(wet),
      complementary_potential: nonNegative(2 * wet - actual),
      relative_evaporation: relative,
    }
  },
})

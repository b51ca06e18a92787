import { definePointwiseFormula } from "../../Formula.js"
import { ALPHA_PT, LATENT_HEAT, SURFACE_DEFAULTS } from "./constants.js"
import { energyTerms, nonNegative } from "./meteorology.js"

/** Equilibrium evaporation (mm day-1) from available energy. */
export const equilibrium = (temperature: number, pressure: number, available: number): number =>
  (energyTerms(temperature, pressure).radiativeWeight * available) / LATENT_HEAT

export const priestleyTaylor = definePointwiseFormula({
  name: "PT",
  family: "radiation-based",
  description: "Priestley-Taylor potential evapotranspiration",
  required: ["temperature", "net_radiation"],
  optional: SURFACE_DEFAULTS,
  parameters: { alpha: ALPHA_PT },
  evaluate: (at, { alpha }) =>
    nonNegative(alpha * equilibrium(at("temperature"), at("pressure"), at("net_radiation") - at("soil_heat_flux"))),
})

/** Priestley-Taylor scaled up by a vapour pressure deficit advection factor. */
export const priestleyTaylorAdvection = definePointwiseFormula({
  name: "PT-advection",
  family: "radiation-based",
  description: "Priestley-Taylor with a VPD advection factor (1 + 0.1 vpd)",
  required: ["temperature", "net_radiation", "vpd"],
  optional: SURFACE_DEFAULTS,
  parameters: { alpha: ALPHA_PT },
  evaluate: (at, { alpha }) => {
    const base = equilibrium(at("temperature"), at("pressure"), at("net_radiation") - at("soil_heat_flux"))
    return nonNegative(alpha * base * (1 + 0.1 * at("vpd")))
  },
})

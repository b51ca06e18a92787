import { definePointwiseFormula } from "../../Formula.js"
import { ALPHA_PT, CO2_REFERENCE, LATENT_HEAT, RS_REFERENCE, SURFACE_DEFAULTS } from "./constants.js"
import {
  aerodynamicResistance,
  clip,
  energyTerms,
  nonNegative,
  resistanceFlux,
  vapourPressureDeficit,
} from "./meteorology.js"

/** Stomatal response to CO2: sqrt(reference / co2). */
export const co2Factor = (co2: number, reference: number): number => Math.sqrt(reference / co2)

/** Penman-Monteith whose surface resistance rises with CO2. */
export const penmanMonteithCo2 = definePointwiseFormula({
  name: "PM-CO2",
  family: "co2-aware",
  description: "Penman-Monteith with CO2-scaled surface resistance",
  required: ["temperature", "relative_humidity", "wind_speed", "net_radiation", "co2"],
  optional: SURFACE_DEFAULTS,
  parameters: { co2_reference: CO2_REFERENCE, surface_resistance: RS_REFERENCE },
  evaluate: (at, { co2_reference, surface_resistance }) => {
    const temperature = at("temperature")
    const terms = energyTerms(temperature, at("pressure"))
    const vpd = vapourPressureDeficit(temperature, at("relative_humidity"))
    const rs = surface_resistance / co2Factor(at("co2"), co2_reference)
    const ra = aerodynamicResistance(at("wind_speed"))
    return nonNegative(resistanceFlux(terms, at("net_radiation") - at("soil_heat_flux"), vpd, ra, rs))
  },
})

/** Two-source Penman-Monteith with LAI and CO2 controlled canopy conductance. */
export const penmanMonteithCo2Lai = definePointwiseFormula({
  name: "PM-CO2-LAI",
  family: "co2-aware",
  description: "Penman-Monteith with canopy conductance scaled by LAI and CO2",
  required: ["temperature", "relative_humidity", "wind_speed", "net_radiation", "co2", "lai"],
  optional: SURFACE_DEFAULTS,
  parameters: { co2_reference: CO2_REFERENCE },
  components: ["transpiration", "evaporation"],
  evaluate: (at, { co2_reference }) => {
    const temperature = at("temperature")
    const lai = at("lai")
    const terms = energyTerms(temperature, at("pressure"))
    const vpd = vapourPressureDeficit(temperature, at("relative_humidity"))

    const conductance = 0.01 * lai * (1 - Math.exp(-0.5 * lai)) * co2Factor(at("co2"), co2_reference)
    const rs = clip(1 / (conductance + 1e-6), 10, 1000)
    const ra = aerodynamicResistance(at("wind_speed"))

    const fCanopy = 1 - Math.exp(-0.6 * lai)
    const canopyRadiation = at("net_radiation") * fCanopy
    const soilRadiation = at("net_radiation") * (1 - fCanopy)
    const transpiration = resistanceFlux(terms, canopyRadiation, vpd, ra, rs)
    const evaporation = (ALPHA_PT * terms.radiativeWeight * (soilRadiation - at("soil_heat_flux"))) / LATENT_HEAT
    return {
      total: nonNegative(transpiration + evaporation),
      transpiration: nonNegative(transpiration),
      evaporation: nonNegative(evaporation),
    }
  },
})

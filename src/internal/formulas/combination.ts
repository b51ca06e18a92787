import { definePointwiseFormula } from "../../Formula.js"
import { LATENT_HEAT, SURFACE_DEFAULTS } from "./constants.js"
import { energyTerms, nonNegative, vapourPressureDeficit } from "./meteorology.js"

/** FAO-56 reference evapotranspiration for a grass surface. */
export const penmanMonteith = definePointwiseFormula({
  name: "PM",
  family: "combination",
  description: "FAO-56 Penman-Monteith reference evapotranspiration",
  required: ["temperature", "relative_humidity", "wind_speed", "net_radiation"],
  optional: SURFACE_DEFAULTS,
  evaluate: (at) => {
    const temperature = at("temperature")
    const windSpeed = at("wind_speed")
    const { delta, gamma } = energyTerms(temperature, at("pressure"))
    const vpd = vapourPressureDeficit(temperature, at("relative_humidity"))
    // wind below 0.5 m s-1 is floored in the resistance term only
    const floored = Math.max(windSpeed, 0.5)
    const numerator = 0.408 * delta * (at("net_radiation") - at("soil_heat_flux")) +
      gamma * (900 / (temperature + 273)) * windSpeed * vpd
    return nonNegative(numerator / (delta + gamma * (1 + 0.34 * floored)))
  },
})

/** Penman open-water potential evaporation with the 1956 wind function. */
export const penmanOpenWater = definePointwiseFormula({
  name: "Penman-OW",
  family: "combination",
  description: "Penman open-water evaporation, wind function 6.43 (1 + 0.536 u)",
  required: ["temperature", "relative_humidity", "wind_speed", "net_radiation"],
  optional: SURFACE_DEFAULTS,
  evaluate: (at) => {
    const temperature = at("temperature")
    const { aerodynamicWeight, radiativeWeight } = energyTerms(temperature, at("pressure"))
    const vpd = vapourPressureDeficit(temperature, at("relative_humidity"))
    const radiative = (radiativeWeight * (at("net_radiation") - at("soil_heat_flux"))) / LATENT_HEAT
    const aerodynamic = (aerodynamicWeight * 6.43 * (1 + 0.536 * at("wind_speed")) * vpd) / LATENT_HEAT
    return nonNegative(radiative + aerodynamic)
  },
})

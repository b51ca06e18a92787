import { definePointwiseFormula } from "../../Formula.js"
import { extraterrestrialRadiation, nonNegative } from "./meteorology.js"

/** Hargreaves-Samani reference evapotranspiration from the daily temperature range. */
export const hargreaves = definePointwiseFormula({
  name: "Hargreaves",
  family: "temperature-based",
  description: "Hargreaves-Samani reference evapotranspiration",
  required: ["temperature", "tmax", "tmin", "latitude", "doy"],
  evaluate: (at) => {
    const ra = extraterrestrialRadiation(at("doy"), at("latitude"))
    return nonNegative(0.0023 * ra * Math.sqrt(at("tmax") - at("tmin")) * (at("temperature") + 17.8))
  },
})

import { definePointwiseFormula } from "../../Formula.js"
import { ALPHA_PT, DEFAULT_SOIL_MOISTURE, LATENT_HEAT, SURFACE_DEFAULTS } from "./constants.js"
import {
  aerodynamicResistance,
  clip,
  energyTerms,
  nonNegative,
  resistanceFlux,
  soilMoistureStress,
  vapourPressureDeficit,
} from "./meteorology.js"

const greenFraction = (lai: number): number => 1 - Math.exp(-lai / 2)

export const priestleyTaylorJpl = definePointwiseFormula({
  name: "PT-JPL",
  family: "vegetation-aware",
  description: "PT-JPL: Priestley-Taylor constrained by green canopy fraction and soil moisture",
  required: ["temperature", "net_radiation", "lai"],
  optional: { ...SURFACE_DEFAULTS, soil_moisture: DEFAULT_SOIL_MOISTURE },
  parameters: { alpha: ALPHA_PT },
  evaluate: (at, { alpha }) => {
    const { radiativeWeight } = energyTerms(at("temperature"), at("pressure"))
    const potential = (alpha * radiativeWeight * (at("net_radiation") - at("soil_heat_flux"))) / LATENT_HEAT
    return nonNegative(potential * greenFraction(at("lai")) * soilMoistureStress(at("soil_moisture")))
  },
})

export const priestleyTaylorJplPartition = definePointwiseFormula({
  name: "PT-JPL-partition",
  family: "vegetation-aware",
  description: "PT-JPL split into transpiration, canopy interception and soil evaporation",
  required: ["temperature", "net_radiation", "lai", "soil_moisture"],
  optional: SURFACE_DEFAULTS,
  parameters: { alpha: ALPHA_PT },
  components: ["transpiration", "canopy_evap", "soil_evap"],
  evaluate: (at, { alpha }) => {
    const { radiativeWeight } = energyTerms(at("temperature"), at("pressure"))
    const fGreen = greenFraction(at("lai"))
    const fSm = soilMoistureStress(at("soil_moisture"))
    const canopyRadiation = at("net_radiation") * fGreen
    const soilRadiation = at("net_radiation") * (1 - fGreen)

    const transpiration = ((alpha * radiativeWeight * canopyRadiation) / LATENT_HEAT) * fSm
    const canopyEvap = (0.1 * canopyRadiation) / LATENT_HEAT
    const soilEvap = ((radiativeWeight * (soilRadiation - at("soil_heat_flux"))) / LATENT_HEAT) * Math.sqrt(fSm)
    return {
      total: nonNegative(transpiration + canopyEvap + soilEvap),
      transpiration: nonNegative(transpiration),
      canopy_evap: nonNegative(canopyEvap),
      soil_evap: nonNegative(soilEvap),
    }
  },
})

interface PmlInputs {
  readonly temperature: number
  readonly relativeHumidity: number
  readonly windSpeed: number
  readonly netRadiation: number
  readonly lai: number
  readonly pressure: number
  readonly soilHeatFlux: number
}

/** Unclamped PML transpiration and soil evaporation. */
export const pmlFluxes = (inputs: PmlInputs): { readonly transpiration: number; readonly evaporation: number } => {
  const { lai, temperature } = inputs
  const terms = energyTerms(temperature, inputs.pressure)
  const vpd = vapourPressureDeficit(temperature, inputs.relativeHumidity)

  const fLai = 1 - Math.exp(-0.5 * lai)
  const fTemp = Math.exp(-((temperature - 25) ** 2) / 200)
  const fVpd = Math.exp(-vpd / 3)
  const conductance = 0.006 * fLai * fTemp * fVpd
  const rs = clip(1 / (conductance + 1e-6), 10, 1000)
  const ra = aerodynamicResistance(inputs.windSpeed)

  const fCanopy = 1 - Math.exp(-0.6 * lai)
  const canopyRadiation = inputs.netRadiation * fCanopy
  const soilRadiation = inputs.netRadiation * (1 - fCanopy)
  return {
    transpiration: resistanceFlux(terms, canopyRadiation, vpd, ra, rs),
    evaporation: (ALPHA_PT * terms.radiativeWeight * (soilRadiation - inputs.soilHeatFlux)) / LATENT_HEAT,
  }
}

const PML_REQUIRED = ["temperature", "relative_humidity", "wind_speed", "net_radiation", "lai"] as const

export const penmanMonteithLeuning = definePointwiseFormula({
  name: "PML",
  family: "vegetation-aware",
  description: "Penman-Monteith-Leuning with canopy conductance and soil evaporation",
  required: PML_REQUIRED,
  optional: SURFACE_DEFAULTS,
  components: ["transpiration", "evaporation"],
  evaluate: (at) => {
    const { evaporation, transpiration } = pmlFluxes({
      temperature: at("temperature"),
      relativeHumidity: at("relative_humidity"),
      windSpeed: at("wind_speed"),
      netRadiation: at("net_radiation"),
      lai: at("lai"),
      pressure: at("pressure"),
      soilHeatFlux: at("soil_heat_flux"),
    })
    return {
      total: nonNegative(transpiration + evaporation),
      transpiration: nonNegative(transpiration),
      evaporation: nonNegative(evaporation),
    }
  },
})

export const pmlV2 = definePointwiseFormula({
  name: "PML-v2",
  family: "vegetation-aware",
  description: "PML with soil moisture limits on transpiration and soil evaporation",
  required: [...PML_REQUIRED, "soil_moisture"],
  optional: SURFACE_DEFAULTS,
  components: ["transpiration", "evaporation"],
  evaluate: (at) => {
    const fluxes = pmlFluxes({
      temperature: at("temperature"),
      relativeHumidity: at("relative_humidity"),
      windSpeed: at("wind_speed"),
      netRadiation: at("net_radiation"),
      lai: at("lai"),
      pressure: at("pressure"),
      soilHeatFlux: at("soil_heat_flux"),
    })
    const soilMoisture = at("soil_moisture")
    const transpiration = nonNegative(fluxes.transpiration) * soilMoistureStress(soilMoisture)
    const evaporation = nonNegative(fluxes.evaporation) * Math.sqrt(clip(soilMoisture, 0, 1))
    return { total: transpiration + evaporation, transpiration, evaporation }
  },
})

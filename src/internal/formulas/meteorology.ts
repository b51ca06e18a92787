import { LATENT_HEAT, RA_GRASS, RHO_CP, SOIL_MOISTURE_CRITICAL, SOLAR_CONSTANT } from "./constants.js"

/** Saturation vapour pressure (kPa) at `temperature` (°C), Tetens form. */
export const saturationVapourPressure = (temperature: number): number =>
  0.6108 * Math.exp((17.27 * temperature) / (temperature + 237.3))

/** Slope of the saturation vapour pressure curve (kPa °C-1). */
export const saturationSlope = (temperature: number): number =>
  (4098 * saturationVapourPressure(temperature)) / (temperature + 237.3) ** 2

/** Psychrometric constant (kPa °C-1) at `pressure` (kPa). */
export const psychrometricConstant = (pressure: number): number => 0.665e-3 * pressure

export const actualVapourPressure = (temperature: number, relativeHumidity: number): number =>
  (saturationVapourPressure(temperature) * relativeHumidity) / 100

export const vapourPressureDeficit = (temperature: number, relativeHumidity: number): number =>
  saturationVapourPressure(temperature) - actualVapourPressure(temperature, relativeHumidity)

export const aerodynamicResistance = (windSpeed: number): number => RA_GRASS / windSpeed

export const clip = (value: number, low: number, high: number): number => Math.min(high, Math.max(low, value))

/** Soil moisture stress factor in [0, 1]. */
export const soilMoistureStress = (soilMoisture: number): number =>
  clip((soilMoisture - SOIL_MOISTURE_CRITICAL) / (1 - SOIL_MOISTURE_CRITICAL), 0, 1)

export const nonNegative = (value: number): number => Math.max(value, 0)

/**
 * Radiative terms shared by the energy-based formulas.
 */
export interface EnergyTerms {
  readonly delta: number
  readonly gamma: number
  /** Δ / (Δ + γ) */
  readonly radiativeWeight: number
  /** γ / (Δ + γ) */
  readonly aerodynamicWeight: number
}

export const energyTerms = (temperature: number, pressure: number): EnergyTerms => {
  const delta = saturationSlope(temperature)
  const gamma = psychrometricConstant(pressure)
  return {
    delta,
    gamma,
    radiativeWeight: delta / (delta + gamma),
    aerodynamicWeight: gamma / (delta + gamma),
  }
}

/**
 * Extraterrestrial radiation (MJ m-2 day-1) for day of year `doy` at
 * `latitude` (degrees). `NaN` where the sun never sets or never rises.
 */
export const extraterrestrialRadiation = (doy: number, latitude: number): number => {
  const phi = (latitude * Math.PI) / 180
  const dr = 1 + 0.033 * Math.cos((2 * Math.PI * doy) / 365)
  const declination = 0.409 * Math.sin((2 * Math.PI * doy) / 365 - 1.39)
  const ws = Math.acos(-Math.tan(phi) * Math.tan(declination))
  return ((24 * 60) / Math.PI) * SOLAR_CONSTANT * dr *
    (ws * Math.sin(phi) * Math.sin(declination) + Math.cos(phi) * Math.cos(declination) * Math.sin(ws))
}

/**
 * Penman-Monteith flux (mm day-1) in resistance form for `available` energy,
 * aerodynamic resistance `ra` and surface resistance `rs` (s m-1).
 */
export const resistanceFlux = (
  terms: EnergyTerms,
  available: number,
  vpd: number,
  ra: number,
  rs: number,
): number =>
  (terms.delta * available + (RHO_CP * vpd) / ra) / (LATENT_HEAT * (terms.delta + terms.gamma * (1 + rs / ra)))

/** Latent heat of vaporization (MJ kg-1). */
export const LATENT_HEAT = 2.45

/** Priestley-Taylor coefficient for well-watered surfaces. */
export const ALPHA_PT = 1.26

/** Reference CO2 concentration (ppm). */
export const CO2_REFERENCE = 380

/** Standard atmospheric pressure (kPa). */
export const STANDARD_PRESSURE = 101.3

/** Air density times specific heat, as used by the resistance forms. */
export const RHO_CP = 1.01 * 1013

/** Grass reference aerodynamic resistance numerator: ra = 208 / u. */
export const RA_GRASS = 208

/** Reference surface resistance (s m-1). */
export const RS_REFERENCE = 70

/** Solar constant (MJ m-2 min-1). */
export const SOLAR_CONSTANT = 0.082

/** Soil moisture below which vegetation is fully stressed (m3 m-3). */
export const SOIL_MOISTURE_CRITICAL = 0.3

export const DEFAULT_SOIL_MOISTURE = 0.5

/** Defaults shared by every formula that takes these inputs as optional. */
export const SURFACE_DEFAULTS = {
  pressure: STANDARD_PRESSURE,
  soil_heat_flux: 0,
} as const

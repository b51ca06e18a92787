import { Effect, Layer } from "effect"
import { EngineConfig } from "../src/Config.js"
import type { ForcingDataset } from "../src/Dataset.js"
import { makeDataset } from "../src/Dataset.js"
import { ExecutionEngine } from "../src/ExecutionEngine.js"
import type { FormulaSpec } from "../src/Formula.js"
import { defineFormula, mapInput } from "../src/Formula.js"
import { FormulaRegistry } from "../src/Registry.js"

export const DAYS = ["2020-06-01", "2020-06-02", "2020-06-03"] as const

/**
 * The four core meteorological drivers over three days.
 */
export const coreInput = {
  timestamps: [...DAYS],
  variables: {
    temperature: [20, 22, 25],
    relative_humidity: [60, 65, 70],
    wind_speed: [2.5, 3.0, 2.0],
    net_radiation: [15, 18, 20],
  },
}

/**
 * Every variable the built-in catalog reads.
 */
export const fullInput = {
  timestamps: [...DAYS],
  variables: {
    ...coreInput.variables,
    lai: [2, 3, 4],
    co2: [380, 400, 420],
    vpd: [1.0, 1.2, 1.5],
    soil_moisture: [0.4, 0.5, 0.6],
    tmax: [26, 28, 31],
    tmin: [14, 16, 19],
    latitude: [40, 40, 40],
    doy: [152, 153, 154],
  },
}

export const datasetOf = (input: unknown): ForcingDataset => Effect.runSync(makeDataset(input))

export const coreDataset = (): ForcingDataset => datasetOf(coreInput)

export const fullDataset = (): ForcingDataset => datasetOf(fullInput)

/** Radiation scaled by a constant; needs only `net_radiation`. */
export const scaledRadiation = (name: string, factor: number): FormulaSpec =>
  defineFormula<"net_radiation">({
    name,
    family: "radiation-based",
    required: ["net_radiation"],
    compute: ({ net_radiation }) => mapInput(net_radiation, (rn) => rn * factor),
  })

export const throwing = (name: string): FormulaSpec =>
  defineFormula({
    name,
    family: "combination",
    required: ["temperature"],
    compute: () => {
      throw new Error("boom")
    },
  })

/** Divides temperature by zero, which yields Infinity rather than an exception. */
export const dividesByZero = (name: string): FormulaSpec =>
  defineFormula<"temperature">({
    name,
    family: "combination",
    required: ["temperature"],
    compute: ({ temperature }) => mapInput(temperature, (t) => t / 0),
  })

export const engineLayer = (specs: ReadonlyArray<FormulaSpec>, tolerance = 0.01) =>
  ExecutionEngine.layer.pipe(
    Layer.provideMerge(FormulaRegistry.layer(specs)),
    Layer.provideMerge(EngineConfig.make({ partitionTolerance: tolerance })),
  )

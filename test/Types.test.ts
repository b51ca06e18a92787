import { describe, it, expect } from "vitest"
import { Schema } from "effect"
import { AlgorithmFamily, FormulaName, isKnownVariable, VariableName } from "../src/Types.js"

describe("Names", () => {
  describe("FormulaName", () => {
    it("decodes a non-empty name", () => {
      expect(Schema.decodeUnknownSync(FormulaName)("PT-JPL")).toBe("PT-JPL")
    })

    it("fails to decode blank or padded names", () => {
      expect(() => Schema.decodeUnknownSync(FormulaName)("")).toThrow()
      expect(() => Schema.decodeUnknownSync(FormulaName)(" PM")).toThrow()
    })
  })

  describe("VariableName", () => {
    it("accepts snake_case", () => {
      expect(Schema.decodeUnknownSync(VariableName)("soil_heat_flux")).toBe("soil_heat_flux")
    })

    it("rejects other casing", () => {
      expect(() => Schema.decodeUnknownSync(VariableName)("NetRadiation")).toThrow()
      expect(() => Schema.decodeUnknownSync(VariableName)("2m_wind")).toThrow()
    })
  })

  it("knows the catalog variables", () => {
    expect(isKnownVariable("net_radiation")).toBe(true)
    expect(isKnownVariable("albedo")).toBe(false)
  })
})

describe("AlgorithmFamily", () => {
  it("rejects unknown families", () => {
    expect(Schema.is(AlgorithmFamily)("combination")).toBe(true)
    expect(Schema.is(AlgorithmFamily)("empirical")).toBe(false)
  })
})

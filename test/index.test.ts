import { describe, it, expect } from "vitest"
import * as Unitpath from "../src/index.js"

describe("public API export surface", () => {
  it("exposes core modules", () => {
    expect(Unitpath).toHaveProperty("TrackedFloat")
    expect(Unitpath).toHaveProperty("Conversion")
    expect(Unitpath).toHaveProperty("Converter")
    expect(Unitpath).toHaveProperty("ConverterStore")
    expect(Unitpath).toHaveProperty("UnitConverter")
    expect(Unitpath).toHaveProperty("CompoundUnit")
    expect(Unitpath).toHaveProperty("defaultCatalog")
    expect(Unitpath).toHaveProperty("normalizeDimension")
    expect(Unitpath).toHaveProperty("NoPathFoundError")
    expect(Unitpath).toHaveProperty("ConverterConfig")
  })
})

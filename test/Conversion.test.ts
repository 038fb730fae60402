import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { Conversion } from "../src/Conversion.js"
import { ZeroMultiplierError } from "../src/Errors.js"
import { TrackedFloat } from "../src/TrackedFloat.js"

describe("Conversion", () => {
  it("applies multiplier then offset", () => {
    const celsiusToFahrenheit = new Conversion("degC", "degF", 1.8, 32)
    expect(celsiusToFahrenheit.apply(0).value).toBe(32)
    expect(celsiusToFahrenheit.apply(100).value).toBeCloseTo(212, 10)
    expect(celsiusToFahrenheit.hasOffset).toBe(true)
  })

  it("rejects a zero multiplier", () => {
    expect(() => new Conversion("a", "b", 0)).toThrow(ZeroMultiplierError)
  })

  it.effect("reports a zero multiplier through make", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(Conversion.make("a", "b", 0))
      expect(error).toBeInstanceOf(ZeroMultiplierError)
      expect(error.srcUnit).toBe("a")
      expect(error.destUnit).toBe("b")
      expect(error.message).toBe("Conversion from 'a' to 'b' cannot have a zero multiplier.")

      const ok = yield* Conversion.make("a", "b", 2, 1)
      expect(ok.multiplier.value).toBe(2)
    }),
  )

  it("builds exact identities", () => {
    const identity = Conversion.identity("m")
    expect(identity.srcUnit).toBe("m")
    expect(identity.destUnit).toBe("m")
    expect(identity.multiplier.value).toBe(1)
    expect(identity.totalAbsoluteError).toBe(0)
    expect(identity.hasOffset).toBe(false)
  })

  it("inverts affine conversions", () => {
    const inverse = new Conversion("degC", "degF", 1.8, 32).invert()
    expect(inverse.srcUnit).toBe("degF")
    expect(inverse.destUnit).toBe("degC")
    expect(inverse.apply(212).value).toBeCloseTo(100, 10)
    expect(inverse.apply(32).value).toBeCloseTo(0, 10)
  })

  it("sums operand errors into totalAbsoluteError", () => {
    const conversion = new Conversion("a", "b", new TrackedFloat(2, 0.25), new TrackedFloat(1, 0.5))
    expect(conversion.totalAbsoluteError).toBe(0.75)
  })

  describe("combination", () => {
    it("chains A→B and B→C", () => {
      const combined = new Conversion("A", "B", 2, 1).combineSequential(new Conversion("B", "C", 3, 4))
      expect(combined.srcUnit).toBe("A")
      expect(combined.destUnit).toBe("C")
      expect(combined.multiplier.value).toBe(6)
      expect(combined.offset.value).toBe(7)
    })

    it("composes metres to miles through kilometres", () => {
      const metresToMiles = new Conversion("m", "km", 0.001).combineSequential(new Conversion("km", "mi", 0.621371))
      expect(metresToMiles.apply(1000).value).toBeCloseTo(0.621371, 12)
    })

    it("joins A→C and B→C into A→B", () => {
      const combined = new Conversion("A", "C", 2, 1).combineConvergent(new Conversion("B", "C", 4, 3))
      expect(combined.srcUnit).toBe("A")
      expect(combined.destUnit).toBe("B")
      expect(combined.multiplier.value).toBe(0.5)
      expect(combined.offset.value).toBe(-0.5)
    })

    it("joins C→A and C→B into A→B", () => {
      const combined = new Conversion("C", "A", 2, 1).combineDivergent(new Conversion("C", "B", 4, 3))
      expect(combined.srcUnit).toBe("A")
      expect(combined.destUnit).toBe("B")
      expect(combined.multiplier.value).toBe(2)
      expect(combined.offset.value).toBe(1)
    })

    it("joins C→A and B→C into A→B", () => {
      const combined = new Conversion("C", "A", 2, 1).combineOpposite(new Conversion("B", "C", 4, 3))
      expect(combined.srcUnit).toBe("A")
      expect(combined.destUnit).toBe("B")
      expect(combined.multiplier.value).toBe(0.125)
      expect(combined.offset.value).toBe(-0.875)
    })

    it("agrees with applying the edges one after another", () => {
      const cToA = new Conversion("C", "A", 2, 1)
      const bToC = new Conversion("B", "C", 4, 3)
      const aToB = cToA.combineOpposite(bToC)
      // A → C → B
      const expected = bToC.invert().apply(cToA.invert().apply(10)).value
      expect(aToB.apply(10).value).toBeCloseTo(expected, 12)
    })
  })

  describe("rescale", () => {
    it("folds prefix multipliers into the multiplier", () => {
      const gramsToPounds = new Conversion("g", "lb", 2)
      const rescaled = gramsToPounds.rescale("kg", "lb", 1000, 1)
      expect(rescaled.srcUnit).toBe("kg")
      expect(rescaled.multiplier.value).toBe(2000)
    })

    it("scales the offset by the destination prefix only", () => {
      const rescaled = new Conversion("a", "b", 1, 10).rescale("a", "kb", 1, 1000)
      expect(rescaled.multiplier.value).toBe(0.001)
      expect(rescaled.offset.value).toBe(0.01)
    })
  })

  it("prints the relation", () => {
    expect(new Conversion("degC", "degF", 1.8, 32).toString()).toBe("degF = degC * 1.8 + 32")
    expect(new Conversion("a", "b", 1, -5).toString()).toBe("b = a * 1 - 5")
    expect(new Conversion("ft", "in", 12).toString()).toBe("in = ft * 12")
  })
})

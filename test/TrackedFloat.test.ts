import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { DivisionByZeroError } from "../src/Errors.js"
import { TrackedFloat } from "../src/TrackedFloat.js"

describe("TrackedFloat", () => {
  describe("construction", () => {
    it("treats exact integers as error free", () => {
      expect(new TrackedFloat(10).absoluteError).toBe(0)
      expect(new TrackedFloat(-42).absoluteError).toBe(0)
    })

    it("assigns half an ULP to inexact literals", () => {
      expect(new TrackedFloat(0.1).absoluteError).toBe(2 ** -57)
    })

    it("keeps an explicit error as its magnitude", () => {
      expect(new TrackedFloat(3, -0.5).absoluteError).toBe(0.5)
    })

    it("gives values that are not finite an infinite error", () => {
      expect(new TrackedFloat(Number.POSITIVE_INFINITY).absoluteError).toBe(Number.POSITIVE_INFINITY)
      expect(new TrackedFloat(Number.NaN, 0).absoluteError).toBe(Number.POSITIVE_INFINITY)
    })

    it("reuses tracked inputs", () => {
      const value = new TrackedFloat(2, 0.1)
      expect(TrackedFloat.from(value)).toBe(value)
      expect(TrackedFloat.from(7).absoluteError).toBe(0)
    })
  })

  describe("relativeError", () => {
    it("is zero when value and error are both zero", () => {
      expect(new TrackedFloat(0).relativeError).toBe(0)
    })

    it("is infinite when only the value is zero", () => {
      expect(new TrackedFloat(0, 0.1).relativeError).toBe(Number.POSITIVE_INFINITY)
    })

    it("divides error by magnitude", () => {
      expect(new TrackedFloat(-4, 1).relativeError).toBe(0.25)
    })
  })

  describe("arithmetic", () => {
    it("adds absolute errors", () => {
      const sum = new TrackedFloat(1, 0.1).add(new TrackedFloat(2, 0.2))
      expect(sum.value).toBe(3)
      expect(sum.absoluteError).toBeCloseTo(0.3, 12)
    })

    it("does not cancel errors on subtraction", () => {
      const difference = new TrackedFloat(5, 0.1).sub(new TrackedFloat(5, 0.1))
      expect(difference.value).toBe(0)
      expect(difference.absoluteError).toBeCloseTo(0.2, 12)
      expect(difference.relativeError).toBe(Number.POSITIVE_INFINITY)
    })

    it("keeps exact sums exact", () => {
      expect(new TrackedFloat(2).add(3).absoluteError).toBe(0)
    })

    it("negates without changing the error", () => {
      const negated = new TrackedFloat(3, 0.5).neg()
      expect(negated.value).toBe(-3)
      expect(negated.absoluteError).toBe(0.5)
    })

    it("adds relative errors on multiplication", () => {
      const product = new TrackedFloat(10, 0.1).mul(new TrackedFloat(20, 0.2))
      expect(product.value).toBe(200)
      expect(product.relativeError).toBeCloseTo(0.02, 10)
    })

    it("bounds the error of a product with zero", () => {
      const product = new TrackedFloat(0, 0.5).mul(new TrackedFloat(4, 0))
      expect(product.value).toBe(0)
      expect(product.absoluteError).toBeCloseTo(2, 12)
    })

    it("keeps exact integer quotients exact", () => {
      const quotient = new TrackedFloat(6).div(3)
      expect(quotient.value).toBe(2)
      expect(quotient.absoluteError).toBe(0)
    })

    it("charges rounding to inexact quotients", () => {
      expect(new TrackedFloat(1).div(3).absoluteError).toBe(2 ** -55)
    })

    it("keeps the relative error on inversion", () => {
      const inverse = new TrackedFloat(4, 0.4).inv()
      expect(inverse.value).toBe(0.25)
      expect(inverse.relativeError).toBeCloseTo(0.1, 12)
    })

    it("scales the relative error by the exponent", () => {
      expect(new TrackedFloat(10).pow(3).relativeError).toBe(0)
      const cube = new TrackedFloat(2, 0.02).pow(3)
      expect(cube.value).toBe(8)
      expect(cube.relativeError).toBeCloseTo(0.03, 12)
    })

    it("carries an infinite error past overflow", () => {
      const overflow = new TrackedFloat(1e308, 1).mul(10)
      expect(overflow.value).toBe(Number.POSITIVE_INFINITY)
      expect(overflow.absoluteError).toBe(Number.POSITIVE_INFINITY)
      expect(overflow.relativeError).toBe(Number.POSITIVE_INFINITY)
      expect(overflow.significantDigits()).toBe(0)
      expect(overflow.toString()).toBe("Infinity ± Infinity")
    })

    it("yields an exact one for a zero exponent", () => {
      const one = new TrackedFloat(7, 0.3).pow(0)
      expect(one.value).toBe(1)
      expect(one.absoluteError).toBe(0)
    })
  })

  describe("division by zero", () => {
    it("throws from div, inv and negative powers of zero", () => {
      expect(() => new TrackedFloat(1).div(0)).toThrow(DivisionByZeroError)
      expect(() => new TrackedFloat(0).inv()).toThrow(DivisionByZeroError)
      expect(() => new TrackedFloat(0).pow(-2)).toThrow(DivisionByZeroError)
    })

    it("reports the failing operation", () => {
      try {
        new TrackedFloat(0).inv()
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(DivisionByZeroError)
        expect(error).toMatchObject({ operation: "inv" })
      }
    })

    it.effect("fails in the error channel through divide", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(TrackedFloat.divide(1, 0))
        expect(error._tag).toBe("DivisionByZeroError")
        expect(error.operation).toBe("div")

        const half = yield* TrackedFloat.divide(1, 2)
        expect(half.value).toBe(0.5)
      }),
    )
  })

  describe("reporting", () => {
    it("counts trustworthy digits", () => {
      expect(new TrackedFloat(10).significantDigits()).toBe(Number.POSITIVE_INFINITY)
      expect(new TrackedFloat(100, 0.5).significantDigits()).toBe(2)
      expect(new TrackedFloat(0, 1).significantDigits()).toBe(0)
    })

    it("prints value and error", () => {
      expect(new TrackedFloat(2, 0.5).toString()).toBe("2 ± 5.00e-1")
    })
  })
})

import { describe, it } from "@effect/vitest"
import { Arbitrary, Effect, Schema } from "effect"
import * as FastCheck from "effect/FastCheck"
import type { TestServices } from "effect/TestServices"
import { Conversion } from "../src/Conversion.js"
import { ConverterStore } from "../src/Converter.js"

const bounded = (min: number, max: number) =>
  Schema.Number.pipe(Schema.nonNaN(), Schema.greaterThanOrEqualTo(min), Schema.lessThanOrEqualTo(max))

const LengthSample = Schema.Struct({
  value: bounded(-1_000_000, 1_000_000),
  src: Schema.Literal("m", "km", "cm", "ft", "in", "yd", "mi", "nmi"),
  dest: Schema.Literal("m", "km", "cm", "ft", "in", "yd", "mi", "nmi"),
})

const TemperatureSample = Schema.Struct({
  value: bounded(-500, 5_000),
  src: Schema.Literal("K", "degC", "degF", "degR"),
  dest: Schema.Literal("K", "degC", "degF", "degR"),
})

const AffineSample = Schema.Struct({
  multiplier: bounded(0.001, 1_000),
  offset: bounded(-1_000, 1_000),
  value: bounded(-1_000, 1_000),
})

const assertAsyncProperty = <Args extends Array<unknown>>(property: FastCheck.IAsyncProperty<Args>) =>
  Effect.tryPromise({
    try: async () => {
      await Promise.resolve(FastCheck.assert(property, { numRuns: 50 }))
    },
    catch: (error) => error,
  })

const store = new ConverterStore()

const roundTrip = (value: number, src: string, dest: string) =>
  Effect.runPromise(
    store.convert(value, src, dest).pipe(Effect.flatMap((converted) => store.convert(converted, dest, src))),
  )

describe("conversion properties", () => {
  it.effect("length conversions round-trip", () =>
    assertAsyncProperty(
      FastCheck.asyncProperty(Arbitrary.make(LengthSample), async ({ value, src, dest }) => {
        const back = await roundTrip(value, src, dest)
        if (Math.abs(back - value) > 1e-9 * Math.max(1, Math.abs(value))) {
          throw new Error(`${value} ${src} -> ${dest} -> ${src} gave ${back}`)
        }
      }),
    ).pipe(Effect.tap(() => Effect.context<TestServices>())),
  )

  it.effect("temperature conversions round-trip", () =>
    assertAsyncProperty(
      FastCheck.asyncProperty(Arbitrary.make(TemperatureSample), async ({ value, src, dest }) => {
        const back = await roundTrip(value, src, dest)
        if (Math.abs(back - value) > 1e-9 * Math.max(1, Math.abs(value))) {
          throw new Error(`${value} ${src} -> ${dest} -> ${src} gave ${back}`)
        }
      }),
    ).pipe(Effect.tap(() => Effect.context<TestServices>())),
  )

  it.effect("inverting twice preserves an affine conversion", () =>
    assertAsyncProperty(
      FastCheck.asyncProperty(Arbitrary.make(AffineSample), async ({ multiplier, offset, value }) => {
        const conversion = new Conversion("a", "b", multiplier, offset)
        const expected = conversion.apply(value).value
        const actual = conversion.invert().invert().apply(value).value
        const tolerance = 1e-9 * (1 + Math.abs(multiplier * value) + Math.abs(offset))
        if (Math.abs(actual - expected) > tolerance) {
          throw new Error(`double inversion of ${conversion} moved ${expected} to ${actual}`)
        }
      }),
    ).pipe(Effect.tap(() => Effect.context<TestServices>())),
  )
})

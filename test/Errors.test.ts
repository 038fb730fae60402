import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  type ConverterError,
  DivisionByZeroError,
  ExpansionDepthError,
  InvalidDimensionError,
  InvalidUnitError,
  NoPathFoundError,
  ZeroMultiplierError,
} from "../src/Errors.js"

describe("Converter error hierarchy", () => {
  it("formats invalid dimension message", () => {
    expect(new InvalidDimensionError({ dimension: "Q2" }).message).toBe("Invalid dimension 'Q2'.")
  })

  it("formats invalid unit message", () => {
    const error = new InvalidUnitError({ unit: "kft", reason: "unknown unit symbol 'kft'." })
    expect(error.message).toBe("Invalid unit 'kft': unknown unit symbol 'kft'.")
  })

  it("formats arithmetic and graph messages", () => {
    expect(new ZeroMultiplierError({ srcUnit: "a", destUnit: "b" }).message).toBe(
      "Conversion from 'a' to 'b' cannot have a zero multiplier.",
    )
    expect(new DivisionByZeroError({ operation: "pow" }).message).toBe("Division by zero in pow.")
    expect(new NoPathFoundError({ dimension: "L", srcUnit: "m", destUnit: "aa" }).message).toBe(
      "No conversion between 'm' and 'aa' could be found.",
    )
    expect(new ExpansionDepthError({ unit: "aa", depth: 3 }).message).toBe(
      "Expansion of 'aa' did not settle after 3 passes.",
    )
  })

  it.effect("supports catchTag on NoPathFoundError", () =>
    Effect.gen(function* () {
      const failing: Effect.Effect<string, ConverterError> = Effect.fail(
        new NoPathFoundError({ dimension: "T", srcUnit: "s", destUnit: "wk" }),
      )
      const handled = yield* failing.pipe(
        Effect.catchTag("NoPathFoundError", (error) => {
          expect(error.dimension).toBe("T")
          expect(error.srcUnit).toBe("s")
          expect(error.destUnit).toBe("wk")
          return Effect.succeed("handled")
        }),
        Effect.catchAll(() => Effect.succeed("other")),
      )

      expect(handled).toBe("handled")
    }),
  )

  it.effect("supports catchTags across the union", () =>
    Effect.gen(function* () {
      const failing: Effect.Effect<string, ConverterError> = Effect.fail(new InvalidDimensionError({ dimension: "X" }))
      const handled = yield* failing.pipe(
        Effect.catchTags({
          InvalidDimensionError: (error) => Effect.succeed(`dimension ${error.dimension}`),
          InvalidUnitError: (error) => Effect.succeed(`unit ${error.unit}`),
        }),
        Effect.catchAll((error) => Effect.succeed(error._tag)),
      )

      expect(handled).toBe("dimension X")
    }),
  )
})

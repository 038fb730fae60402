/**
 * Floating-point values that carry an estimate of their accumulated error.
 *
 * Each arithmetic operation returns a new instance whose `absoluteError`
 * bounds the uncertainty of the operands plus the rounding of the operation
 * itself. The converter uses the resulting error both for the numbers it
 * returns and to rank competing conversion paths.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { DivisionByZeroError } from "./Errors.js"
import { halfUlp, isExactInteger } from "./internal/float.js"

/**
 * Anything accepted where a tracked operand is expected.
 *
 * @since 0.1.0
 */
export type TrackedInput = number | TrackedFloat

/**
 * A number paired with its absolute error.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const area = new TrackedFloat(10, 0.1).mul(new TrackedFloat(20, 0.2))
 * area.value         // 200
 * area.relativeError // ≈ 0.02
 * ```
 */
export class TrackedFloat {
  readonly value: number
  readonly absoluteError: number

  /**
   * When `absoluteError` is omitted it is estimated from the literal: zero for
   * exact integers, half an ULP otherwise. A value that is not finite has an
   * infinite error.
   */
  constructor(value: number, absoluteError?: number) {
    this.value = value
    this.absoluteError = !Number.isFinite(value)
      ? Number.POSITIVE_INFINITY
      : absoluteError === undefined
        ? isExactInteger(value) ? 0 : halfUlp(value)
        : Math.abs(absoluteError)
  }

  static from(input: TrackedInput): TrackedFloat {
    return input instanceof TrackedFloat ? input : new TrackedFloat(input)
  }

  /**
   * Division that reports a zero divisor in the failure channel instead of
   * throwing.
   *
   * @category Constructors
   * @since 0.1.0
   */
  static divide(
    dividend: TrackedInput,
    divisor: TrackedInput,
  ): Effect.Effect<TrackedFloat, DivisionByZeroError> {
    const right = TrackedFloat.from(divisor)
    return right.value === 0
      ? Effect.fail(new DivisionByZeroError({ operation: "div" }))
      : Effect.sync(() => TrackedFloat.from(dividend).div(right))
  }

  /**
   * `0` when value and error are both zero, `Infinity` when only the value is
   * or when the error is unbounded.
   */
  get relativeError(): number {
    if (this.value === 0) {
      return this.absoluteError === 0 ? 0 : Number.POSITIVE_INFINITY
    }
    if (!Number.isFinite(this.absoluteError)) {
      return Number.POSITIVE_INFINITY
    }
    return Math.abs(this.absoluteError / this.value)
  }

  add(other: TrackedInput): TrackedFloat {
    const right = TrackedFloat.from(other)
    return withRounding(this.value + right.value, this.absoluteError + right.absoluteError)
  }

  sub(other: TrackedInput): TrackedFloat {
    const right = TrackedFloat.from(other)
    return withRounding(this.value - right.value, this.absoluteError + right.absoluteError)
  }

  neg(): TrackedFloat {
    return new TrackedFloat(-this.value, this.absoluteError)
  }

  mul(other: TrackedInput): TrackedFloat {
    const right = TrackedFloat.from(other)
    const value = this.value * right.value
    // relative errors are undefined at zero, fall back to the first-order bound
    const error =
      this.value !== 0 && right.value !== 0
        ? Math.abs(value) * (this.relativeError + right.relativeError)
        : Math.abs(right.value) * this.absoluteError +
          Math.abs(this.value) * right.absoluteError +
          this.absoluteError * right.absoluteError
    return withRounding(value, error)
  }

  div(other: TrackedInput): TrackedFloat {
    const right = TrackedFloat.from(other)
    if (right.value === 0) {
      throw new DivisionByZeroError({ operation: "div" })
    }
    const value = this.value / right.value
    const error =
      this.value !== 0
        ? Math.abs(value) * (this.relativeError + right.relativeError)
        : this.absoluteError / Math.abs(right.value)
    return withInexactRounding(value, error)
  }

  inv(): TrackedFloat {
    if (this.value === 0) {
      throw new DivisionByZeroError({ operation: "inv" })
    }
    const value = 1 / this.value
    return withInexactRounding(value, Math.abs(value) * this.relativeError)
  }

  pow(exponent: number): TrackedFloat {
    if (exponent === 0) {
      return new TrackedFloat(1, 0)
    }
    if (this.value === 0) {
      if (exponent < 0) {
        throw new DivisionByZeroError({ operation: "pow" })
      }
      return new TrackedFloat(0, this.absoluteError ** exponent)
    }
    const value = this.value ** exponent
    return withInexactRounding(value, Math.abs(value) * this.relativeError * Math.abs(exponent))
  }

  /**
   * Number of decimal digits that can be trusted; `Infinity` for exact values.
   */
  significantDigits(): number {
    if (this.absoluteError === 0) {
      return Number.POSITIVE_INFINITY
    }
    if (!Number.isFinite(this.absoluteError) || this.value === 0) {
      return 0
    }
    return Math.max(0, Math.floor(-Math.log10(this.relativeError)))
  }

  toString(): string {
    return `${this.value} ± ${this.absoluteError.toExponential(2)}`
  }
}

// Rounding of the operation itself only matters once there is error to carry.
const withRounding = (value: number, error: number): TrackedFloat =>
  new TrackedFloat(value, error > 0 ? error + halfUlp(value) : 0)

const withInexactRounding = (value: number, error: number): TrackedFloat =>
  new TrackedFloat(value, error > 0 || !isExactInteger(value) ? error + halfUlp(value) : 0)

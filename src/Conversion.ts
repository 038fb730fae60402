/**
 * Affine conversions between two units, `dest = src * multiplier + offset`.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { ZeroMultiplierError } from "./Errors.js"
import { TrackedFloat, type TrackedInput } from "./TrackedFloat.js"

/**
 * A directed conversion edge. The reverse direction is obtained with
 * {@link Conversion.invert} and is never assumed to exist.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const celsiusToFahrenheit = new Conversion("degC", "degF", 1.8, 32)
 * celsiusToFahrenheit.apply(100).value // 212
 * ```
 */
export class Conversion {
  readonly srcUnit: string
  readonly destUnit: string
  readonly multiplier: TrackedFloat
  readonly offset: TrackedFloat

  /**
   * @throws ZeroMultiplierError when the multiplier is zero.
   */
  constructor(srcUnit: string, destUnit: string, multiplier: TrackedInput, offset: TrackedInput = 0) {
    const m = TrackedFloat.from(multiplier)
    if (m.value === 0) {
      throw new ZeroMultiplierError({ srcUnit, destUnit })
    }
    this.srcUnit = srcUnit
    this.destUnit = destUnit
    this.multiplier = m
    this.offset = TrackedFloat.from(offset)
  }

  /**
   * Effectful constructor that fails with `ZeroMultiplierError` instead of
   * throwing.
   *
   * @category Constructors
   * @since 0.1.0
   */
  static make(
    srcUnit: string,
    destUnit: string,
    multiplier: TrackedInput,
    offset: TrackedInput = 0,
  ): Effect.Effect<Conversion, ZeroMultiplierError> {
    return TrackedFloat.from(multiplier).value === 0
      ? Effect.fail(new ZeroMultiplierError({ srcUnit, destUnit }))
      : Effect.succeed(new Conversion(srcUnit, destUnit, multiplier, offset))
  }

  /**
   * @category Constructors
   * @since 0.1.0
   */
  static identity(unit: string): Conversion {
    return new Conversion(unit, unit, 1, 0)
  }

  /**
   * Error of the conversion for an input of magnitude 1. Used only to rank
   * candidate paths.
   */
  get totalAbsoluteError(): number {
    return this.multiplier.absoluteError + this.offset.absoluteError
  }

  get hasOffset(): boolean {
    return this.offset.value !== 0
  }

  apply(value: TrackedInput): TrackedFloat {
    return this.multiplier.mul(value).add(this.offset)
  }

  invert(): Conversion {
    const multiplier = this.multiplier.inv()
    return new Conversion(this.destUnit, this.srcUnit, multiplier, this.offset.neg().div(this.multiplier))
  }

  /**
   * `this: A→B`, `other: B→C`, result `A→C`.
   */
  combineSequential(other: Conversion): Conversion {
    return new Conversion(
      this.srcUnit,
      other.destUnit,
      this.multiplier.mul(other.multiplier),
      this.offset.mul(other.multiplier).add(other.offset),
    )
  }

  /**
   * `this: A→C`, `other: B→C`, result `A→B`.
   */
  combineConvergent(other: Conversion): Conversion {
    return new Conversion(
      this.srcUnit,
      other.srcUnit,
      this.multiplier.div(other.multiplier),
      this.offset.sub(other.offset).div(other.multiplier),
    )
  }

  /**
   * `this: C→A`, `other: C→B`, result `A→B`.
   */
  combineDivergent(other: Conversion): Conversion {
    const multiplier = other.multiplier.div(this.multiplier)
    return new Conversion(
      this.destUnit,
      other.destUnit,
      multiplier,
      other.offset.sub(this.offset.mul(multiplier)),
    )
  }

  /**
   * `this: C→A`, `other: B→C`, result `A→B`.
   */
  combineOpposite(other: Conversion): Conversion {
    return new Conversion(
      this.destUnit,
      other.srcUnit,
      this.multiplier.mul(other.multiplier).inv(),
      other.offset.neg().sub(this.offset.div(this.multiplier)).div(other.multiplier),
    )
  }

  /**
   * Rebinds the conversion to prefixed endpoints. With source and destination
   * prefix multipliers `ps` and `pd` the result is `m·ps/pd` and `k/pd`.
   */
  rescale(
    srcUnit: string,
    destUnit: string,
    srcPrefixMultiplier: TrackedInput,
    destPrefixMultiplier: TrackedInput,
  ): Conversion {
    const destMultiplier = TrackedFloat.from(destPrefixMultiplier)
    return new Conversion(
      srcUnit,
      destUnit,
      this.multiplier.mul(srcPrefixMultiplier).div(destMultiplier),
      this.offset.div(destMultiplier),
    )
  }

  toString(): string {
    const base = `${this.destUnit} = ${this.srcUnit} * ${this.multiplier.value}`
    if (!this.hasOffset) {
      return base
    }
    return this.offset.value < 0 ? `${base} - ${-this.offset.value}` : `${base} + ${this.offset.value}`
  }
}

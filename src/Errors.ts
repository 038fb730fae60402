/**
 * Error hierarchy for unit conversion.
 *
 * Every failure mode is a tagged error so callers can pattern match with
 * `Effect.catchTag`. "No conversion path" is only an error for `convert`;
 * lookups report a missing path as `Option.none()`.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when a dimension code cannot be parsed.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * yield* Effect.fail(new InvalidDimensionError({ dimension: "X" }))
 * ```
 */
export class InvalidDimensionError extends Data.TaggedError("InvalidDimensionError")<{
  readonly dimension: string
}> {
  override get message(): string {
    return `Invalid dimension '${this.dimension}'.`
  }
}

/**
 * Raised when a unit is unknown, malformed, or belongs to another dimension.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidUnitError extends Data.TaggedError("InvalidUnitError")<{
  readonly unit: string
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid unit '${this.unit}': ${this.reason}`
  }
}

/**
 * Raised when a conversion is constructed with a multiplier of zero.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ZeroMultiplierError extends Data.TaggedError("ZeroMultiplierError")<{
  readonly srcUnit: string
  readonly destUnit: string
}> {
  override get message(): string {
    return `Conversion from '${this.srcUnit}' to '${this.destUnit}' cannot have a zero multiplier.`
  }
}

/**
 * Raised by tracked arithmetic when dividing by, inverting, or raising zero to
 * a negative power.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DivisionByZeroError extends Data.TaggedError("DivisionByZeroError")<{
  readonly operation: "div" | "inv" | "pow"
}> {
  override get message(): string {
    return `Division by zero in ${this.operation}.`
  }
}

/**
 * Raised by `convert` when two valid units of one dimension are not connected.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NoPathFoundError extends Data.TaggedError("NoPathFoundError")<{
  readonly dimension: string
  readonly srcUnit: string
  readonly destUnit: string
}> {
  override get message(): string {
    return `No conversion between '${this.srcUnit}' and '${this.destUnit}' could be found.`
  }
}

/**
 * Raised when unit expansion does not settle within the configured depth.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ExpansionDepthError extends Data.TaggedError("ExpansionDepthError")<{
  readonly unit: string
  readonly depth: number
}> {
  override get message(): string {
    return `Expansion of '${this.unit}' did not settle after ${this.depth} passes.`
  }
}

/**
 * Union of all converter-related error types.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ConverterError =
  | InvalidDimensionError
  | InvalidUnitError
  | ZeroMultiplierError
  | DivisionByZeroError
  | NoPathFoundError
  | ExpansionDepthError

/**
 * Unit values: prefixes, catalog units, prefixed and exponentiated unit terms,
 * and compound units built from several terms.
 *
 * Every value the converter accepts as "a unit" implements {@link UnitLike},
 * so callers never need to inspect which variant they hold.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import {
  applyExponent,
  combineDimensions,
  formatDimension,
  isValidDimension,
  parseDimension,
  type DimensionMap,
} from "./Dimensions.js"
import { InvalidUnitError } from "./Errors.js"
import { toSuperscript } from "./internal/superscript.js"

/**
 * Capability shared by every unit variant.
 *
 * @since 0.1.0
 */
export interface UnitLike {
  readonly _tag: "Unit" | "UnitTerm" | "CompoundUnit"
  readonly asciiSymbol: string
  readonly unicodeSymbol: string
  /** Canonical dimension code. */
  readonly dimension: string
  format(ascii?: boolean): string
}

/**
 * Bit flags naming the prefix families a unit accepts.
 *
 * @since 0.1.0
 */
export const PrefixGroup = {
  None: 0,
  SmallMetric: 1,
  LargeMetric: 2,
  Metric: 3,
  Binary: 4,
  LargeMetricAndBinary: 6,
} as const

const DimensionCode = Schema.String.pipe(
  Schema.filter(isValidDimension, { message: () => "Expected a dimension code such as 'MLT-2'" }),
)

const MAX_EXPONENT = 9

/**
 * @category Models
 * @since 0.1.0
 */
export class Prefix extends Schema.Class<Prefix>("Prefix")({
  name: Schema.NonEmptyTrimmedString,
  symbol: Schema.NonEmptyTrimmedString,
  unicode: Schema.optional(Schema.NonEmptyTrimmedString),
  multiplier: Schema.Number.pipe(Schema.greaterThan(0)),
  group: Schema.Int,
}) {
  get asciiSymbol(): string {
    return this.symbol
  }

  get unicodeSymbol(): string {
    return this.unicode ?? this.symbol
  }
}

/**
 * A unit as listed in the catalog, always unprefixed and with exponent 1.
 *
 * @category Models
 * @since 0.1.0
 */
export class Unit extends Schema.Class<Unit>("Unit")({
  name: Schema.NonEmptyTrimmedString,
  symbol: Schema.NonEmptyTrimmedString,
  unicode: Schema.optional(Schema.NonEmptyTrimmedString),
  quantity: Schema.optional(Schema.String),
  dimension: DimensionCode,
  systems: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
  prefixGroup: Schema.optionalWith(Schema.Int, { default: () => PrefixGroup.None }),
  /** Equivalent compound unit symbol, e.g. `kg*m*s-2` for the newton. */
  expansion: Schema.optional(Schema.NonEmptyTrimmedString),
  expansionValue: Schema.optional(Schema.Number.pipe(Schema.greaterThan(0))),
}) implements UnitLike {
  get _tag(): "Unit" {
    return "Unit"
  }

  get asciiSymbol(): string {
    return this.symbol
  }

  get unicodeSymbol(): string {
    return this.unicode ?? this.symbol
  }

  get expandable(): boolean {
    return this.expansion !== undefined
  }

  acceptsPrefix(prefix: Prefix): boolean {
    return (this.prefixGroup & prefix.group) !== 0
  }

  format(ascii = false): string {
    return ascii ? this.asciiSymbol : this.unicodeSymbol
  }
}

/**
 * A unit with an optional prefix and a non-zero integer exponent, e.g. `km²`.
 *
 * @category Models
 * @since 0.1.0
 */
export class UnitTerm implements UnitLike {
  readonly _tag = "UnitTerm" as const
  readonly unit: Unit
  readonly prefix: Prefix | undefined
  readonly exponent: number

  constructor(unit: Unit, prefix?: Prefix, exponent = 1) {
    if (!Number.isInteger(exponent) || exponent === 0 || Math.abs(exponent) > MAX_EXPONENT) {
      throw new InvalidUnitError({
        unit: unit.symbol,
        reason: `exponent must be a non-zero integer between -${MAX_EXPONENT} and ${MAX_EXPONENT}, got ${exponent}.`,
      })
    }
    this.unit = unit
    this.prefix = prefix
    this.exponent = exponent
  }

  /** Prefix and unit without the exponent; compound units combine terms on it. */
  get prefixedSymbol(): string {
    return `${this.prefix?.asciiSymbol ?? ""}${this.unit.asciiSymbol}`
  }

  get asciiSymbol(): string {
    return this.exponent === 1 ? this.prefixedSymbol : `${this.prefixedSymbol}${this.exponent}`
  }

  get unicodeSymbol(): string {
    const symbol = `${this.prefix?.unicodeSymbol ?? ""}${this.unit.unicodeSymbol}`
    return this.exponent === 1 ? symbol : `${symbol}${toSuperscript(this.exponent)}`
  }

  get dimensionMap(): DimensionMap {
    return applyExponent(parseDimension(this.unit.dimension) ?? {}, this.exponent)
  }

  get dimension(): string {
    return formatDimension(this.dimensionMap)
  }

  get prefixMultiplier(): number {
    return this.prefix?.multiplier ?? 1
  }

  /** Scale of the term relative to its unprefixed form. */
  get multiplier(): number {
    return this.prefixMultiplier ** this.exponent
  }

  removePrefix(): UnitTerm {
    return this.prefix === undefined ? this : new UnitTerm(this.unit, undefined, this.exponent)
  }

  withExponent(exponent: number): UnitTerm {
    return new UnitTerm(this.unit, this.prefix, exponent)
  }

  pow(exponent: number): UnitTerm {
    return this.withExponent(this.exponent * exponent)
  }

  inv(): UnitTerm {
    return this.withExponent(-this.exponent)
  }

  format(ascii = false): string {
    return ascii ? this.asciiSymbol : this.unicodeSymbol
  }

  toString(): string {
    return this.asciiSymbol
  }
}

/**
 * An ordered product of unit terms. Terms sharing a prefixed symbol are
 * combined on construction and terms whose exponents cancel are removed.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const speed = new CompoundUnit([metre, second.inv()])
 * speed.asciiSymbol   // "m*s-1"
 * speed.unicodeSymbol // "m·s⁻¹"
 * speed.dimension     // "LT-1"
 * ```
 */
export class CompoundUnit implements UnitLike {
  readonly _tag = "CompoundUnit" as const
  readonly terms: ReadonlyArray<UnitTerm>

  constructor(terms: Iterable<UnitTerm> = []) {
    const combined = new Map<string, UnitTerm>()
    for (const term of terms) {
      const existing = combined.get(term.prefixedSymbol)
      if (existing === undefined) {
        combined.set(term.prefixedSymbol, term)
        continue
      }
      const exponent = existing.exponent + term.exponent
      if (exponent === 0) {
        combined.delete(term.prefixedSymbol)
      } else {
        combined.set(term.prefixedSymbol, existing.withExponent(exponent))
      }
    }
    this.terms = [...combined.values()]
  }

  static of(...terms: ReadonlyArray<UnitTerm>): CompoundUnit {
    return new CompoundUnit(terms)
  }

  static fromUnit(unit: Unit): CompoundUnit {
    return new CompoundUnit([new UnitTerm(unit)])
  }

  get isDimensionless(): boolean {
    return this.terms.length === 0
  }

  /** True for a single term with exponent 1, such as `km` or `N`. */
  get isSimple(): boolean {
    return this.terms.length === 1 && this.terms[0]?.exponent === 1
  }

  get asciiSymbol(): string {
    return this.terms.map((term) => term.asciiSymbol).join("*")
  }

  get unicodeSymbol(): string {
    return this.terms.map((term) => term.unicodeSymbol).join("·")
  }

  get dimensionMap(): DimensionMap {
    return this.terms.reduce<DimensionMap>(
      (dimension, term) => combineDimensions(dimension, term.dimensionMap),
      {},
    )
  }

  get dimension(): string {
    return formatDimension(this.dimensionMap)
  }

  /** Product of the prefix scales of all terms. */
  get multiplier(): number {
    return this.terms.reduce((product, term) => product * term.multiplier, 1)
  }

  get hasPrefixes(): boolean {
    return this.terms.some((term) => term.prefix !== undefined)
  }

  get hasExpandableTerms(): boolean {
    return this.terms.some((term) => term.unit.expandable)
  }

  /** True when two terms measure the same base dimension, as in `m*ft`. */
  get hasMergeableTerms(): boolean {
    const seen = new Set<string>()
    for (const term of this.terms) {
      if (seen.has(term.unit.dimension)) {
        return true
      }
      seen.add(term.unit.dimension)
    }
    return false
  }

  removePrefixes(): CompoundUnit {
    return this.hasPrefixes ? new CompoundUnit(this.terms.map((term) => term.removePrefix())) : this
  }

  mul(other: CompoundUnit | UnitTerm): CompoundUnit {
    return new CompoundUnit([...this.terms, ...(other instanceof UnitTerm ? [other] : other.terms)])
  }

  pow(exponent: number): CompoundUnit {
    if (exponent === 0) {
      return new CompoundUnit()
    }
    return new CompoundUnit(this.terms.map((term) => term.pow(exponent)))
  }

  inv(): CompoundUnit {
    return this.pow(-1)
  }

  equals(other: UnitLike): boolean {
    return this.asciiSymbol === other.asciiSymbol
  }

  format(ascii = false): string {
    return ascii ? this.asciiSymbol : this.unicodeSymbol
  }

  toString(): string {
    return this.asciiSymbol
  }
}

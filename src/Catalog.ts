/**
 * Unit, prefix and conversion catalogs.
 *
 * The bundled catalog lives in `data/*.json` beside the package and is decoded
 * with `effect/Schema` on first use. Custom catalogs are assembled in memory
 * with {@link makeCatalog} and {@link extendCatalog}.
 *
 * @since 0.1.0
 */

import { readFileSync } from "node:fs"
import { Effect, Either, Option, Schema } from "effect"
import { formatDimension, isValidDimension, parseDimension } from "./Dimensions.js"
import { InvalidUnitError } from "./Errors.js"
import { parseUnitExpression } from "./internal/parser/UnitParser.js"
import { CompoundUnit, Prefix, Unit, UnitTerm } from "./Units.js"

/**
 * A conversion known a priori, `dest = src * multiplier + offset`.
 *
 * @category Models
 * @since 0.1.0
 */
export class ConversionDefinition extends Schema.Class<ConversionDefinition>("ConversionDefinition")({
  dimension: Schema.String.pipe(Schema.filter(isValidDimension)),
  src: Schema.NonEmptyTrimmedString,
  dest: Schema.NonEmptyTrimmedString,
  multiplier: Schema.Number.pipe(Schema.filter((n) => n !== 0, { message: () => "multiplier must not be zero" })),
  offset: Schema.optionalWith(Schema.Number, { default: () => 0 }),
}) {}

/**
 * @category Models
 * @since 0.1.0
 */
export interface CatalogInput {
  readonly units?: ReadonlyArray<Unit>
  readonly prefixes?: ReadonlyArray<Prefix>
  readonly conversions?: ReadonlyArray<ConversionDefinition>
}

const canonical = (dimension: string): string => formatDimension(parseDimension(dimension) ?? {})

/**
 * Lookup tables for units, prefixes and direct conversions.
 *
 * @category Models
 * @since 0.1.0
 */
export class Catalog {
  readonly units: ReadonlyArray<Unit>
  readonly prefixes: ReadonlyArray<Prefix>
  readonly conversions: ReadonlyArray<ConversionDefinition>
  readonly #bySymbol: ReadonlyMap<string, Unit>
  // longest symbols first so "da" wins over "d"
  readonly #prefixesBySymbol: ReadonlyArray<readonly [string, Prefix]>

  constructor(input: CatalogInput) {
    this.units = input.units ?? []
    this.prefixes = input.prefixes ?? []
    this.conversions = input.conversions ?? []

    const bySymbol = new Map<string, Unit>()
    for (const unit of this.units) {
      for (const symbol of [unit.asciiSymbol, unit.unicodeSymbol]) {
        if (!bySymbol.has(symbol)) {
          bySymbol.set(symbol, unit)
        }
      }
    }
    this.#bySymbol = bySymbol
    this.#prefixesBySymbol = this.prefixes
      .flatMap((prefix) => [...new Set([prefix.asciiSymbol, prefix.unicodeSymbol])].map((s) => [s, prefix] as const))
      .sort(([a], [b]) => b.length - a.length)
  }

  lookupUnit(symbol: string): Option.Option<Unit> {
    return Option.fromNullable(this.#bySymbol.get(symbol))
  }

  /**
   * Resolve a possibly prefixed symbol. An exact unit symbol always wins, so
   * `min` is the minute rather than a milli-inch.
   */
  resolveTerm(symbol: string): Option.Option<{ readonly unit: Unit; readonly prefix: Prefix | undefined }> {
    const exact = this.#bySymbol.get(symbol)
    if (exact) {
      return Option.some({ unit: exact, prefix: undefined })
    }
    for (const [prefixSymbol, prefix] of this.#prefixesBySymbol) {
      if (symbol.length <= prefixSymbol.length || !symbol.startsWith(prefixSymbol)) {
        continue
      }
      const unit = this.#bySymbol.get(symbol.slice(prefixSymbol.length))
      if (unit && unit.acceptsPrefix(prefix)) {
        return Option.some({ unit, prefix })
      }
    }
    return Option.none()
  }

  unitsByDimension(dimension: string): ReadonlyArray<Unit> {
    const code = canonical(dimension)
    return this.units.filter((unit) => canonical(unit.dimension) === code)
  }

  conversionsFor(dimension: string): ReadonlyArray<ConversionDefinition> {
    const code = canonical(dimension)
    return this.conversions.filter((conversion) => canonical(conversion.dimension) === code)
  }

  /**
   * Parse a unit expression such as `kg*m/s2` or `km²` against this catalog.
   */
  parseEither(text: string): Either.Either<CompoundUnit, InvalidUnitError> {
    const symbol = text.trim()
    return Either.try({
      try: () => parseUnitExpression(symbol),
      catch: (error) => new InvalidUnitError({ unit: symbol, reason: describe(error) }),
    }).pipe(
      Either.flatMap((rawTerms): Either.Either<CompoundUnit, InvalidUnitError> => {
        const terms: Array<UnitTerm> = []
        for (const raw of rawTerms) {
          const resolved = this.resolveTerm(raw.symbol)
          if (Option.isNone(resolved)) {
            return Either.left(new InvalidUnitError({ unit: symbol, reason: `unknown unit symbol '${raw.symbol}'.` }))
          }
          const { unit, prefix } = resolved.value
          const term = Either.try({
            try: () => new UnitTerm(unit, prefix, raw.exponent),
            catch: (error) => new InvalidUnitError({ unit: symbol, reason: describe(error) }),
          })
          if (Either.isLeft(term)) {
            return Either.left(term.left)
          }
          terms.push(term.right)
        }
        return Either.right(new CompoundUnit(terms))
      }),
    )
  }

  parse(text: string): Effect.Effect<CompoundUnit, InvalidUnitError> {
    return Effect.suspend(() => this.parseEither(text))
  }
}

const describe = (error: unknown): string => {
  if (error instanceof InvalidUnitError) {
    return error.reason
  }
  return error instanceof Error ? error.message : String(error)
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeCatalog = (input: CatalogInput): Catalog => new Catalog(input)

/**
 * Entries are appended. A symbol already taken by a unit keeps resolving to
 * the earlier unit.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const extendCatalog = (catalog: Catalog, input: CatalogInput): Catalog =>
  new Catalog({
    units: [...catalog.units, ...(input.units ?? [])],
    prefixes: [...catalog.prefixes, ...(input.prefixes ?? [])],
    conversions: [...catalog.conversions, ...(input.conversions ?? [])],
  })

const readData = <A, I>(file: string, schema: Schema.Schema<A, I>): A =>
  Schema.decodeUnknownSync(schema)(JSON.parse(readFileSync(new URL(`../data/${file}`, import.meta.url), "utf8")))

let bundled: Catalog | undefined

/**
 * The catalog shipped in `data/`, loaded once per process.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const defaultCatalog = (): Catalog => {
  if (bundled === undefined) {
    bundled = new Catalog({
      units: readData("units.json", Schema.Array(Unit)),
      prefixes: readData("prefixes.json", Schema.Array(Prefix)),
      conversions: readData("conversions.json", Schema.Array(ConversionDefinition)),
    })
  }
  return bundled
}

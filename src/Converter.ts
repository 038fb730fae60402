/**
 * Per-dimension unit converters.
 *
 * A {@link Converter} owns the conversion graph of one dimension: nodes are
 * unprefixed unit symbols, edges are {@link Conversion}s. The graph starts
 * with the catalog's direct conversions and grows as paths are discovered,
 * each composed path being published back as a direct edge. Prefixes never
 * appear in a search; they are stripped before and reapplied after.
 *
 * Converters live in a {@link ConverterStore}, which holds at most one
 * converter per normalized dimension code. The process-wide store backs the
 * static accessors on `Converter`; the {@link UnitConverter} service owns an
 * isolated one.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Option } from "effect"
import { type Catalog, type ConversionDefinition, defaultCatalog } from "./Catalog.js"
import { ConverterConfig, DEFAULT_CONVERTER_SETTINGS, type ConverterSettings } from "./Config.js"
import { Conversion } from "./Conversion.js"
import { normalizeDimension, parseDimension, siBaseUnit } from "./Dimensions.js"
import {
  ExpansionDepthError,
  InvalidDimensionError,
  InvalidUnitError,
  NoPathFoundError,
  ZeroMultiplierError,
} from "./Errors.js"
import { findBestPath } from "./internal/graph/PathSearch.js"
import { TrackedFloat, type TrackedInput } from "./TrackedFloat.js"
import { CompoundUnit, type UnitTerm } from "./Units.js"

/**
 * Anything accepted where a unit is expected: a parsed compound unit or its
 * symbol.
 *
 * @since 0.1.0
 */
export type UnitInput = CompoundUnit | string

/**
 * A value together with the unit it is expressed in.
 *
 * @category Models
 * @since 0.1.0
 */
export interface ScaledUnit {
  readonly value: number
  readonly unit: CompoundUnit
}

interface TrackedScaledUnit {
  readonly factor: TrackedFloat
  readonly unit: CompoundUnit
}

const symbolOf = (unit: UnitInput): string => (typeof unit === "string" ? unit.trim() : unit.asciiSymbol)

/**
 * Conversion graph for a single dimension.
 *
 * @category Models
 * @since 0.1.0
 */
export class Converter {
  readonly dimension: string
  readonly #store: ConverterStore
  readonly #units = new Map<string, CompoundUnit>()
  readonly #edges = new Map<string, Map<string, Conversion>>()
  readonly #derived = new WeakSet<Conversion>()
  readonly #lock = Effect.unsafeMakeSemaphore(1)

  /** @internal use {@link ConverterStore.get} */
  constructor(dimension: string, store: ConverterStore) {
    this.dimension = dimension
    this.#store = store
  }

  /**
   * Converter of the process-wide store, created and bootstrapped on first
   * access.
   *
   * @category Constructors
   * @since 0.1.0
   * @example
   * ```ts
   * const length = yield* Converter.getByDimension("L")
   * const metres = yield* length.convert(100, "ft", "m") // 30.48
   * ```
   */
  static getByDimension(dimension: string): Effect.Effect<Converter, InvalidDimensionError> {
    return ConverterStore.global.get(dimension)
  }

  /**
   * Forget every converter of the process-wide store.
   */
  static clearAll(): Effect.Effect<void> {
    return ConverterStore.global.clearAll()
  }

  static expand(
    value: number,
    unit: UnitInput,
  ): Effect.Effect<ScaledUnit, InvalidUnitError | NoPathFoundError | ExpansionDepthError> {
    return ConverterStore.global.expand(value, unit)
  }

  static merge(value: number, unit: UnitInput): Effect.Effect<ScaledUnit, InvalidUnitError | NoPathFoundError> {
    return ConverterStore.global.merge(value, unit)
  }

  get catalog(): Catalog {
    return this.#store.catalog
  }

  /** Symbols of the registered unprefixed units. */
  get units(): ReadonlyArray<string> {
    return [...this.#units.keys()]
  }

  /** Every edge currently in the graph, catalog and discovered. */
  get conversions(): ReadonlyArray<Conversion> {
    return [...this.#edges.values()].flatMap((targets) => [...targets.values()])
  }

  /**
   * True when a direct edge from `srcUnit` to `destUnit` is already known.
   * No search is performed.
   */
  hasConversion(srcUnit: string, destUnit: string): boolean {
    return this.#edge(srcUnit, destUnit) !== undefined
  }

  /**
   * Register an unprefixed unit together with edges to its structural
   * variants: its expansion, its merged form and its SI base form. A prefixed
   * unit registers its unprefixed form.
   *
   * @category Mutations
   * @since 0.1.0
   */
  addUnit(unit: UnitInput): Effect.Effect<void, InvalidUnitError> {
    return Effect.gen(this, function* () {
      const parsed = yield* this.#resolve(unit)
      const base = parsed.removePrefixes()
      const key = base.asciiSymbol
      if (this.#units.has(key)) {
        return
      }
      this.#units.set(key, base)
      yield* Effect.logDebug("registered unit").pipe(Effect.annotateLogs({ unit: key }))

      const [term] = base.terms
      if (base.isSimple && term?.unit.expansion !== undefined) {
        const expansion = yield* this.catalog.parse(term.unit.expansion)
        yield* this.#addStructuralEdge(base, expansion, new TrackedFloat(term.unit.expansionValue ?? 1))
      }

      if (base.hasMergeableTerms) {
        const merged = yield* this.#store.mergeTracked(1, base).pipe(
          Effect.map(Option.some),
          Effect.catchTag("NoPathFoundError", (error) =>
            Effect.logDebug("no merged form", error.message).pipe(Effect.as(Option.none<TrackedScaledUnit>())),
          ),
        )
        if (Option.isSome(merged)) {
          yield* this.#addStructuralEdge(base, merged.value.unit, merged.value.factor)
        }
      }

      if (!base.isSimple && !base.isDimensionless) {
        const target = yield* this.#store.siBase(this.dimension)
        if (target.asciiSymbol !== key) {
          const factor = yield* this.#store.siFactor(base)
          if (Option.isSome(factor)) {
            yield* this.#addStructuralEdge(base, target, factor.value)
          }
        }
      }
    }).pipe(Effect.annotateLogs({ dimension: this.dimension }))
  }

  /**
   * Register a direct edge `dest = src * multiplier + offset`. The edge is
   * stored between the unprefixed units, so both endpoints may be prefixed.
   * Discovered and prefix-rescaled edges are dropped and found again on
   * demand.
   *
   * @category Mutations
   * @since 0.1.0
   */
  addConversion(
    srcUnit: UnitInput,
    destUnit: UnitInput,
    multiplier: TrackedInput,
    offset: TrackedInput = 0,
  ): Effect.Effect<Conversion, InvalidUnitError | ZeroMultiplierError> {
    return Effect.gen(this, function* () {
      const src = yield* this.#resolve(srcUnit)
      const dest = yield* this.#resolve(destUnit)
      const given = yield* Conversion.make(src.asciiSymbol, dest.asciiSymbol, multiplier, offset)
      yield* this.#define(unscale(given, src, dest))
      yield* this.addUnit(src)
      yield* this.addUnit(dest)
      return given
    })
  }

  /**
   * Conversion from `srcUnit` to `destUnit`, discovering and caching a path
   * when no direct edge exists. `None` when the units are not connected.
   *
   * @category Conversions
   * @since 0.1.0
   */
  getConversion(srcUnit: UnitInput, destUnit: UnitInput): Effect.Effect<Option.Option<Conversion>, InvalidUnitError> {
    return Effect.gen(this, function* () {
      const src = yield* this.#resolve(srcUnit)
      const dest = yield* this.#resolve(destUnit)
      if (src.asciiSymbol === dest.asciiSymbol) {
        return Option.some(Conversion.identity(src.asciiSymbol))
      }
      const cached = this.#edge(src.asciiSymbol, dest.asciiSymbol)
      if (cached) {
        return Option.some(cached)
      }

      const srcBase = src.removePrefixes()
      const destBase = dest.removePrefixes()
      yield* this.addUnit(srcBase)
      yield* this.addUnit(destBase)

      const base =
        srcBase.asciiSymbol === destBase.asciiSymbol
          ? Option.some(Conversion.identity(srcBase.asciiSymbol))
          : yield* this.#discover(srcBase.asciiSymbol, destBase.asciiSymbol)
      if (Option.isNone(base) || (!src.hasPrefixes && !dest.hasPrefixes)) {
        return base
      }

      const conversion = base.value.rescale(src.asciiSymbol, dest.asciiSymbol, src.multiplier, dest.multiplier)
      this.#derived.add(conversion)
      yield* this.#publish(conversion, false)
      return Option.some(conversion)
    }).pipe(Effect.annotateLogs({ dimension: this.dimension }))
  }

  /**
   * Multiplier of {@link getConversion}, for callers that know no offset
   * applies.
   *
   * @category Conversions
   * @since 0.1.0
   */
  getConversionFactor(srcUnit: UnitInput, destUnit: UnitInput): Effect.Effect<Option.Option<number>, InvalidUnitError> {
    return this.getConversion(srcUnit, destUnit).pipe(Effect.map(Option.map((c) => c.multiplier.value)))
  }

  /**
   * @category Conversions
   * @since 0.1.0
   */
  convert(value: number, srcUnit: UnitInput, destUnit: UnitInput): Effect.Effect<number, InvalidUnitError | NoPathFoundError> {
    return this.convertTracked(value, srcUnit, destUnit).pipe(Effect.map((result) => result.value))
  }

  /**
   * Like {@link convert} but keeps the propagated error of the result.
   *
   * @category Conversions
   * @since 0.1.0
   */
  convertTracked(
    value: TrackedInput,
    srcUnit: UnitInput,
    destUnit: UnitInput,
  ): Effect.Effect<TrackedFloat, InvalidUnitError | NoPathFoundError> {
    return this.getConversion(srcUnit, destUnit).pipe(
      Effect.flatMap(
        Option.match({
          onNone: () =>
            Effect.fail(
              new NoPathFoundError({
                dimension: this.dimension,
                srcUnit: symbolOf(srcUnit),
                destUnit: symbolOf(destUnit),
              }),
            ),
          onSome: (conversion) => Effect.succeed(conversion.apply(value)),
        }),
      ),
    )
  }

  /**
   * Load the catalog's direct conversions and units for this dimension. A
   * catalog entry that cannot be used is logged and skipped.
   *
   * @internal
   */
  bootstrap(): Effect.Effect<void> {
    return Effect.gen(this, function* () {
      for (const definition of this.catalog.conversionsFor(this.dimension)) {
        yield* this.#loadDefinition(definition).pipe(
          Effect.catchAll((error) =>
            Effect.logWarning("skipped catalog conversion", error.message).pipe(
              Effect.annotateLogs({ src: definition.src, dest: definition.dest }),
            ),
          ),
        )
      }
      for (const unit of this.catalog.unitsByDimension(this.dimension)) {
        yield* this.addUnit(CompoundUnit.fromUnit(unit)).pipe(
          Effect.catchAll((error) =>
            Effect.logWarning("skipped catalog unit", error.message).pipe(Effect.annotateLogs({ unit: unit.symbol })),
          ),
        )
      }
      yield* Effect.logDebug("bootstrapped dimension").pipe(
        Effect.annotateLogs({ units: this.#units.size, edges: this.conversions.length }),
      )
    }).pipe(Effect.annotateLogs({ dimension: this.dimension }))
  }

  /**
   * Discover a conversion for every ordered pair of registered units. Pairs
   * that are not connected stay missing.
   *
   * @category Conversions
   * @since 0.1.0
   */
  completeMatrix(): Effect.Effect<void, InvalidUnitError> {
    return Effect.gen(this, function* () {
      const units = [...this.#units.values()]
      for (const src of units) {
        for (const dest of units) {
          if (src.asciiSymbol !== dest.asciiSymbol) {
            yield* this.getConversion(src, dest)
          }
        }
      }
      yield* Effect.logDebug("completed conversion matrix").pipe(
        Effect.annotateLogs({ units: units.length, edges: this.conversions.length }),
      )
    }).pipe(Effect.annotateLogs({ dimension: this.dimension }))
  }

  /** True when a direct edge joins every ordered pair of registered units. */
  get isMatrixComplete(): boolean {
    const symbols = this.units
    return symbols.every((src) => symbols.every((dest) => src === dest || this.hasConversion(src, dest)))
  }

  /** Units registered here that expand and carry neither prefix nor exponent. */
  get expandableUnits(): ReadonlyArray<CompoundUnit> {
    return [...this.#units.values()].filter((unit) => unit.isSimple && unit.hasExpandableTerms)
  }

  #loadDefinition(definition: ConversionDefinition): Effect.Effect<void, InvalidUnitError | ZeroMultiplierError> {
    return Effect.gen(this, function* () {
      const src = yield* this.#resolve(definition.src)
      const dest = yield* this.#resolve(definition.dest)
      const given = yield* Conversion.make(src.asciiSymbol, dest.asciiSymbol, definition.multiplier, definition.offset)
      yield* this.#publish(unscale(given, src, dest), true)
      yield* this.addUnit(src)
      yield* this.addUnit(dest)
    })
  }

  #resolve(unit: UnitInput): Effect.Effect<CompoundUnit, InvalidUnitError> {
    return Effect.gen(this, function* () {
      const parsed = typeof unit === "string" ? yield* this.catalog.parse(unit) : unit
      if (parsed.dimension !== this.dimension) {
        return yield* Effect.fail(
          new InvalidUnitError({
            unit: parsed.asciiSymbol,
            reason: `has dimension '${parsed.dimension}', expected '${this.dimension}'.`,
          }),
        )
      }
      return parsed
    })
  }

  #edge(srcUnit: string, destUnit: string): Conversion | undefined {
    return this.#edges.get(srcUnit)?.get(destUnit)
  }

  /**
   * Insert an edge. Readers only ever see complete conversions; an existing
   * edge is kept unless `replace` is set.
   */
  #publish(conversion: Conversion, replace: boolean): Effect.Effect<void> {
    return this.#lock.withPermits(1)(Effect.sync(() => this.#put(conversion, replace)))
  }

  /**
   * Replace a definition edge and forget everything derived from the old
   * graph.
   */
  #define(conversion: Conversion): Effect.Effect<void> {
    return this.#lock.withPermits(1)(
      Effect.suspend(() => {
        this.#put(conversion, true)
        let dropped = 0
        for (const targets of this.#edges.values()) {
          for (const [destUnit, edge] of targets) {
            if (this.#derived.has(edge)) {
              targets.delete(destUnit)
              dropped++
            }
          }
        }
        return dropped === 0
          ? Effect.void
          : Effect.logDebug("dropped cached conversions").pipe(
              Effect.annotateLogs({ src: conversion.srcUnit, dest: conversion.destUnit, dropped }),
            )
      }),
    )
  }

  #put(conversion: Conversion, replace: boolean): void {
    const targets = this.#edges.get(conversion.srcUnit) ?? new Map<string, Conversion>()
    if (replace || !targets.has(conversion.destUnit)) {
      targets.set(conversion.destUnit, conversion)
    }
    this.#edges.set(conversion.srcUnit, targets)
  }

  /**
   * Search and publish under the dimension's lock, so concurrent requests for
   * the same pair search once.
   */
  #discover(srcUnit: string, destUnit: string): Effect.Effect<Option.Option<Conversion>> {
    return this.#lock.withPermits(1)(
      Effect.gen(this, function* () {
        const cached = this.#edge(srcUnit, destUnit)
        if (cached) {
          return Option.some(cached)
        }
        const found = findBestPath(this.conversions, srcUnit, destUnit, this.#store.settings.maxPathHops)
        if (Option.isNone(found)) {
          yield* Effect.logDebug("no conversion path").pipe(Effect.annotateLogs({ src: srcUnit, dest: destUnit }))
          return Option.none()
        }
        this.#derived.add(found.value.conversion)
        this.#put(found.value.conversion, false)
        yield* Effect.logDebug("discovered conversion").pipe(
          Effect.annotateLogs({
            path: found.value.path.join(" -> "),
            hops: found.value.hops,
            error: found.value.conversion.totalAbsoluteError,
          }),
        )
        return Option.some(found.value.conversion)
      }),
    )
  }

  #addStructuralEdge(
    base: CompoundUnit,
    target: CompoundUnit,
    multiplier: TrackedFloat,
  ): Effect.Effect<void, InvalidUnitError> {
    return Effect.gen(this, function* () {
      const checked = yield* this.#resolve(target)
      const targetBase = checked.removePrefixes()
      if (targetBase.asciiSymbol === base.asciiSymbol) {
        return
      }
      const conversion = new Conversion(
        base.asciiSymbol,
        targetBase.asciiSymbol,
        multiplier.mul(checked.multiplier),
      )
      yield* this.#publish(conversion, false)
      yield* this.addUnit(targetBase)
    })
  }
}

/**
 * Rewrite a conversion between prefixed units as one between their unprefixed
 * forms: `m·pd/ps` and `k·pd`.
 */
const unscale = (conversion: Conversion, src: CompoundUnit, dest: CompoundUnit): Conversion => {
  if (!src.hasPrefixes && !dest.hasPrefixes) {
    return conversion
  }
  return new Conversion(
    src.removePrefixes().asciiSymbol,
    dest.removePrefixes().asciiSymbol,
    conversion.multiplier.mul(dest.multiplier).div(src.multiplier),
    conversion.offset.mul(dest.multiplier),
  )
}

/**
 * Registry holding at most one {@link Converter} per normalized dimension.
 * Expansion and merging span dimensions and therefore live here.
 *
 * @category Models
 * @since 0.1.0
 */
export class ConverterStore {
  readonly settings: ConverterSettings
  readonly #catalog: Catalog | (() => Catalog)
  readonly #converters = new Map<string, Converter>()

  constructor(catalog: Catalog | (() => Catalog) = defaultCatalog, settings: ConverterSettings = DEFAULT_CONVERTER_SETTINGS) {
    this.#catalog = catalog
    this.settings = settings
  }

  static #global: ConverterStore | undefined

  /** Store backing the static `Converter` accessors, using the bundled catalog. */
  static get global(): ConverterStore {
    if (ConverterStore.#global === undefined) {
      ConverterStore.#global = new ConverterStore()
    }
    return ConverterStore.#global
  }

  get catalog(): Catalog {
    return typeof this.#catalog === "function" ? this.#catalog() : this.#catalog
  }

  /** Normalized codes of the dimensions that currently have a converter. */
  get dimensions(): ReadonlyArray<string> {
    return [...this.#converters.keys()]
  }

  get(dimension: string): Effect.Effect<Converter, InvalidDimensionError> {
    return Effect.gen(this, function* () {
      const code = yield* normalizeDimension(dimension)
      const existing = this.#converters.get(code)
      if (existing) {
        return existing
      }
      const converter = new Converter(code, this)
      this.#converters.set(code, converter)
      yield* converter.bootstrap()
      return converter
    })
  }

  clearAll(): Effect.Effect<void> {
    return Effect.sync(() => this.#converters.clear())
  }

  /**
   * Convert between two units of any dimension; the dimension is taken from
   * the source unit.
   */
  convert(
    value: number,
    srcUnit: UnitInput,
    destUnit: UnitInput,
  ): Effect.Effect<number, InvalidUnitError | NoPathFoundError> {
    return Effect.gen(this, function* () {
      const src = typeof srcUnit === "string" ? yield* this.catalog.parse(srcUnit) : srcUnit
      const converter = yield* this.#converterFor(src.dimension)
      return yield* converter.convert(value, src, destUnit)
    })
  }

  /**
   * Replace every expandable term by its expansion, repeatedly, then merge
   * terms of one dimension. Terms without an expansion of their own are
   * expanded through an expandable unit of their dimension when one is
   * registered, e.g. `lbf` through `N`.
   *
   * @category Conversions
   * @since 0.1.0
   * @example
   * ```ts
   * const { value, unit } = yield* store.expand(2, "kN")
   * // value 2000, unit.asciiSymbol "kg*m*s-2"
   * ```
   */
  expand(
    value: number,
    unit: UnitInput,
  ): Effect.Effect<ScaledUnit, InvalidUnitError | NoPathFoundError | ExpansionDepthError> {
    return Effect.gen(this, function* () {
      const start = typeof unit === "string" ? yield* this.catalog.parse(unit) : unit
      let current = start
      let factor = new TrackedFloat(value)
      for (let depth = 0; ; depth++) {
        const step = yield* this.#expandOnce(current)
        if (Option.isNone(step)) {
          break
        }
        if (depth >= this.settings.maxExpansionDepth) {
          return yield* Effect.fail(new ExpansionDepthError({ unit: start.asciiSymbol, depth }))
        }
        factor = factor.mul(step.value.factor)
        current = step.value.unit
      }
      const merged = yield* this.mergeTracked(factor, current)
      return { value: merged.factor.value, unit: merged.unit }
    })
  }

  /**
   * Fold terms sharing a dimension into the first such term, e.g. `m*ft`
   * becomes `m2` with the value scaled by `0.3048`.
   *
   * @category Conversions
   * @since 0.1.0
   */
  merge(value: number, unit: UnitInput): Effect.Effect<ScaledUnit, InvalidUnitError | NoPathFoundError> {
    return Effect.gen(this, function* () {
      const parsed = typeof unit === "string" ? yield* this.catalog.parse(unit) : unit
      const merged = yield* this.mergeTracked(value, parsed)
      return { value: merged.factor.value, unit: merged.unit }
    })
  }

  /** @internal */
  mergeTracked(
    value: TrackedInput,
    unit: CompoundUnit,
  ): Effect.Effect<TrackedScaledUnit, InvalidUnitError | NoPathFoundError> {
    return Effect.gen(this, function* () {
      const groups = new Map<string, { readonly canonical: UnitTerm; exponent: number }>()
      let factor = TrackedFloat.from(value)
      for (const term of unit.terms) {
        const single = term.withExponent(1)
        const group = groups.get(single.dimension)
        if (group === undefined) {
          groups.set(single.dimension, { canonical: term, exponent: term.exponent })
          continue
        }
        const canonical = group.canonical.withExponent(1)
        const converter = yield* this.#converterFor(single.dimension)
        const conversion = yield* converter.getConversion(single.asciiSymbol, canonical.asciiSymbol)
        if (Option.isNone(conversion)) {
          return yield* Effect.fail(
            new NoPathFoundError({
              dimension: single.dimension,
              srcUnit: single.asciiSymbol,
              destUnit: canonical.asciiSymbol,
            }),
          )
        }
        factor = factor.mul(conversion.value.multiplier.pow(term.exponent))
        group.exponent += term.exponent
      }
      const terms = yield* Effect.try({
        try: () =>
          [...groups.values()]
            .filter((group) => group.exponent !== 0)
            .map((group) => group.canonical.withExponent(group.exponent)),
        catch: (error) =>
          error instanceof InvalidUnitError ? error : new InvalidUnitError({ unit: unit.asciiSymbol, reason: String(error) }),
      })
      return { factor, unit: new CompoundUnit(terms) }
    })
  }

  /** @internal SI base form of a dimension, without prefixes (`g*m*s-2`). */
  siBase(dimension: string): Effect.Effect<CompoundUnit, InvalidUnitError> {
    return this.catalog
      .parse(siBaseUnit(parseDimension(dimension) ?? {}))
      .pipe(Effect.map((unit) => unit.removePrefixes()))
  }

  /**
   * @internal Factor from an unprefixed unit to the SI base form of its
   * dimension, term by term. `None` when some term has no path to its base.
   */
  siFactor(unit: CompoundUnit): Effect.Effect<Option.Option<TrackedFloat>, InvalidUnitError> {
    return Effect.gen(this, function* () {
      let factor = new TrackedFloat(1)
      for (const term of unit.terms) {
        const single = term.removePrefix().withExponent(1)
        const target = yield* this.siBase(single.dimension)
        if (target.asciiSymbol === single.asciiSymbol) {
          continue
        }
        const converter = yield* this.#converterFor(single.dimension)
        const conversion = yield* converter.getConversion(single.asciiSymbol, target)
        if (Option.isNone(conversion)) {
          return Option.none()
        }
        factor = factor.mul(conversion.value.multiplier.pow(term.exponent))
      }
      return Option.some(factor)
    })
  }

  #expandOnce(unit: CompoundUnit): Effect.Effect<Option.Option<TrackedScaledUnit>, InvalidUnitError> {
    return Effect.gen(this, function* () {
      let factor = new TrackedFloat(1)
      let changed = false
      const parts: Array<CompoundUnit> = []
      for (const term of unit.terms) {
        const { expansion, expansionValue } = term.unit
        if (expansion !== undefined) {
          const target = yield* this.catalog.parse(expansion)
          parts.push(yield* raise(target, term.exponent))
          factor = factor.mul(new TrackedFloat(term.multiplier)).mul(new TrackedFloat(expansionValue ?? 1).pow(term.exponent))
          changed = true
          continue
        }
        const indirect = yield* this.#indirectExpansion(term)
        if (Option.isSome(indirect)) {
          const [substitute, multiplier] = indirect.value
          parts.push(yield* raise(substitute, term.exponent))
          factor = factor.mul(new TrackedFloat(term.multiplier)).mul(multiplier.pow(term.exponent))
          changed = true
          continue
        }
        parts.push(CompoundUnit.of(term))
      }
      if (!changed) {
        return Option.none()
      }
      return Option.some({ factor, unit: new CompoundUnit(parts.flatMap((part) => part.terms)) })
    })
  }

  #indirectExpansion(
    term: UnitTerm,
  ): Effect.Effect<Option.Option<readonly [CompoundUnit, TrackedFloat]>, InvalidUnitError> {
    return Effect.gen(this, function* () {
      const single = term.removePrefix().withExponent(1)
      const converter = yield* this.#converterFor(single.dimension)
      const [substitute] = converter.expandableUnits
      if (substitute === undefined) {
        return Option.none()
      }
      const conversion = yield* converter.getConversion(CompoundUnit.of(single), substitute)
      return Option.map(conversion, (c) => [substitute, c.multiplier] as const)
    })
  }

  /** Dimension codes reaching here come from validated units. */
  #converterFor(dimension: string): Effect.Effect<Converter> {
    return this.get(dimension).pipe(Effect.orDie)
  }
}

const raise = (unit: CompoundUnit, exponent: number): Effect.Effect<CompoundUnit, InvalidUnitError> =>
  Effect.try({
    try: () => unit.pow(exponent),
    catch: (error) =>
      error instanceof InvalidUnitError ? error : new InvalidUnitError({ unit: unit.asciiSymbol, reason: String(error) }),
  })

/**
 * @category Services
 * @since 0.1.0
 */
export interface UnitConverterService {
  readonly getByDimension: (dimension: string) => Effect.Effect<Converter, InvalidDimensionError>
  readonly convert: (
    value: number,
    srcUnit: UnitInput,
    destUnit: UnitInput,
  ) => Effect.Effect<number, InvalidUnitError | NoPathFoundError>
  readonly expand: (
    value: number,
    unit: UnitInput,
  ) => Effect.Effect<ScaledUnit, InvalidUnitError | NoPathFoundError | ExpansionDepthError>
  readonly merge: (value: number, unit: UnitInput) => Effect.Effect<ScaledUnit, InvalidUnitError | NoPathFoundError>
  readonly clearAll: Effect.Effect<void>
}

/**
 * Converter service backed by its own {@link ConverterStore}, configured from
 * {@link ConverterConfig}.
 *
 * @category Services
 * @since 0.1.0
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const converter = yield* UnitConverter
 *   return yield* converter.convert(1, "mi", "km")
 * })
 * Effect.runPromise(program.pipe(Effect.provide(UnitConverter.Default)))
 * ```
 */
export class UnitConverter extends Context.Tag("unitpath/UnitConverter")<UnitConverter, UnitConverterService>() {
  static layer(catalog: Catalog | (() => Catalog) = defaultCatalog) {
    return Layer.effect(
      this,
      Effect.gen(function* () {
        const settings = yield* ConverterConfig
        const store = new ConverterStore(catalog, settings)
        yield* Effect.logDebug("converter store ready").pipe(
          Effect.annotateLogs({ maxPathHops: settings.maxPathHops, maxExpansionDepth: settings.maxExpansionDepth }),
        )
        const service: UnitConverterService = {
          getByDimension: (dimension) => store.get(dimension),
          convert: (value, srcUnit, destUnit) => store.convert(value, srcUnit, destUnit),
          expand: (value, unit) => store.expand(value, unit),
          merge: (value, unit) => store.merge(value, unit),
          clearAll: store.clearAll(),
        }
        return service
      }),
    )
  }

  static readonly Default = UnitConverter.layer()
}

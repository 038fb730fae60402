/**
 * Dimension codes.
 *
 * A code is a sequence of dimension letters, each optionally followed by a
 * signed integer exponent, e.g. `MLT-2` for force. Letters always appear in
 * the canonical order `M L A D C T I H N J`, exponents of zero are dropped and
 * the empty string denotes a dimensionless quantity.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { InvalidDimensionError } from "./Errors.js"

/**
 * Exponent per dimension letter, e.g. `{ M: 1, L: 1, T: -2 }`.
 *
 * @since 0.1.0
 */
export type DimensionMap = Readonly<Record<string, number>>

/**
 * Dimension letters in canonical order, with the SI base unit of each.
 *
 * @since 0.1.0
 */
export const DIMENSIONS = [
  { letter: "M", name: "mass", siBase: "kg" },
  { letter: "L", name: "length", siBase: "m" },
  { letter: "A", name: "angle", siBase: "rad" },
  { letter: "D", name: "data", siBase: "B" },
  { letter: "C", name: "currency", siBase: "XAU" },
  { letter: "T", name: "time", siBase: "s" },
  { letter: "I", name: "electric current", siBase: "A" },
  { letter: "H", name: "temperature", siBase: "K" },
  { letter: "N", name: "amount of substance", siBase: "mol" },
  { letter: "J", name: "luminous intensity", siBase: "cd" },
] as const

const LETTER_ORDER: ReadonlyArray<string> = DIMENSIONS.map((d) => d.letter)

const DIMENSION_CODE = /^(?:[MLADCTIHNJ](?:-?\d+)?)*$/
const DIMENSION_TERM = /([MLADCTIHNJ])(-?\d+)?/g

export const isValidDimension = (code: string): boolean => DIMENSION_CODE.test(code)

/**
 * Parse a code into a map. Repeated letters are summed and zero exponents
 * dropped. Returns `undefined` for malformed codes.
 *
 * @category Parsing
 * @since 0.1.0
 */
export const parseDimension = (code: string): DimensionMap | undefined => {
  if (!isValidDimension(code)) {
    return undefined
  }
  const result: Record<string, number> = {}
  for (const [, letter, exponent] of code.matchAll(DIMENSION_TERM)) {
    if (letter !== undefined) {
      result[letter] = (result[letter] ?? 0) + (exponent === undefined ? 1 : Number(exponent))
    }
  }
  return dropZeros(result)
}

/**
 * @category Formatting
 * @since 0.1.0
 */
export const formatDimension = (dimension: DimensionMap): string =>
  LETTER_ORDER.map((letter) => {
    const exponent = dimension[letter] ?? 0
    if (exponent === 0) {
      return ""
    }
    return exponent === 1 ? letter : `${letter}${exponent}`
  }).join("")

/**
 * Validate a code and rewrite it in canonical order, e.g. `T-2LM` becomes
 * `MLT-2`.
 *
 * @category Parsing
 * @since 0.1.0
 */
export const normalizeDimension = (code: string): Effect.Effect<string, InvalidDimensionError> => {
  const parsed = parseDimension(code)
  return parsed === undefined
    ? Effect.fail(new InvalidDimensionError({ dimension: code }))
    : Effect.succeed(formatDimension(parsed))
}

export const applyExponent = (dimension: DimensionMap, exponent: number): DimensionMap => {
  const result: Record<string, number> = {}
  for (const [letter, value] of Object.entries(dimension)) {
    result[letter] = value * exponent
  }
  return dropZeros(result)
}

export const combineDimensions = (left: DimensionMap, right: DimensionMap): DimensionMap => {
  const result: Record<string, number> = { ...left }
  for (const [letter, value] of Object.entries(right)) {
    result[letter] = (result[letter] ?? 0) + value
  }
  return dropZeros(result)
}

/**
 * Symbol of the SI base compound unit for a dimension, e.g. `kg*m*s-2` for
 * `MLT-2`. The dimensionless code yields the empty string.
 *
 * @since 0.1.0
 */
export const siBaseUnit = (dimension: DimensionMap): string =>
  DIMENSIONS.flatMap(({ letter, siBase }) => {
    const exponent = dimension[letter] ?? 0
    if (exponent === 0) {
      return []
    }
    return [exponent === 1 ? siBase : `${siBase}${exponent}`]
  }).join("*")

const dropZeros = (dimension: Record<string, number>): DimensionMap =>
  Object.fromEntries(Object.entries(dimension).filter(([, exponent]) => exponent !== 0))

import type { IToken, TokenType } from "chevrotain"
import { Data } from "effect"
import { fromSuperscript } from "../superscript.js"
import {
  Caret,
  Exponent,
  LParen,
  RParen,
  Slash,
  Star,
  SuperscriptExponent,
  UnitLexer,
  UnitSymbol,
} from "./tokens.js"

/**
 * A unit symbol as written, possibly prefixed, with the exponent it carries
 * after grouping and division have been applied.
 */
export interface RawTerm {
  readonly symbol: string
  readonly exponent: number
}

export class UnitSyntaxError extends Data.TaggedError("UnitSyntaxError")<{
  readonly input: string
  readonly reason: string
  readonly offset: number | undefined
}> {
  override get message(): string {
    return this.offset === undefined ? this.reason : `${this.reason} at offset ${this.offset}`
  }
}

class Stream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #source: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#tokens = tokens
    this.#source = source
  }

  peek(offset = 0): IToken | undefined {
    return this.#tokens[this.#index + offset]
  }

  match(tokenType: TokenType): IToken | undefined {
    const token = this.peek()
    if (token && token.tokenType === tokenType) {
      this.#index += 1
      return token
    }
    return undefined
  }

  expect(tokenType: TokenType, reason: string): IToken {
    const token = this.match(tokenType)
    if (!token) {
      throw this.error(this.peek(), reason)
    }
    return token
  }

  done(): boolean {
    return this.#index >= this.#tokens.length
  }

  error(token: IToken | undefined, reason: string): UnitSyntaxError {
    return new UnitSyntaxError({ input: this.#source, reason, offset: token?.startOffset })
  }
}

const raise = (terms: ReadonlyArray<RawTerm>, exponent: number): ReadonlyArray<RawTerm> =>
  exponent === 1 ? terms : terms.map((term) => ({ symbol: term.symbol, exponent: term.exponent * exponent }))

const parseProduct = (stream: Stream): ReadonlyArray<RawTerm> => {
  const terms = [...parseTerm(stream)]
  while (true) {
    if (stream.match(Star)) {
      terms.push(...parseTerm(stream))
      continue
    }
    if (stream.match(Slash)) {
      terms.push(...raise(parseTerm(stream), -1))
      continue
    }
    break
  }
  return terms
}

const parseTerm = (stream: Stream): ReadonlyArray<RawTerm> => {
  const base = parseAtom(stream)
  const superscript = stream.match(SuperscriptExponent)
  const explicit = superscript === undefined && stream.match(Caret) !== undefined
  const exponentToken =
    superscript ?? (explicit ? stream.expect(Exponent, "Expected exponent after '^'") : stream.match(Exponent))
  if (!exponentToken) {
    return base
  }
  const exponent = superscript ? fromSuperscript(exponentToken.image) : Number(exponentToken.image)
  if (!Number.isInteger(exponent) || exponent === 0) {
    throw stream.error(exponentToken, "Exponent must be a non-zero integer")
  }
  return raise(base, exponent)
}

const parseAtom = (stream: Stream): ReadonlyArray<RawTerm> => {
  if (stream.match(LParen)) {
    const inner = parseProduct(stream)
    stream.expect(RParen, "Expected ')'")
    return inner
  }
  const token = stream.expect(UnitSymbol, "Expected unit symbol")
  return [{ symbol: token.image, exponent: 1 }]
}

/**
 * Split a unit expression such as `kg*m/s2`, `km²` or `N·m` into its terms.
 * An empty expression is dimensionless and yields no terms.
 *
 * @throws UnitSyntaxError
 */
export const parseUnitExpression = (text: string): ReadonlyArray<RawTerm> => {
  const lexing = UnitLexer.tokenize(text)
  const lexError = lexing.errors[0]
  if (lexError) {
    throw new UnitSyntaxError({ input: text, reason: lexError.message, offset: lexError.offset })
  }
  if (lexing.tokens.length === 0) {
    return []
  }
  const stream = new Stream(lexing.tokens, text)
  const result = parseProduct(stream)
  if (!stream.done()) {
    throw stream.error(stream.peek(), "Unexpected trailing input")
  }
  return result
}

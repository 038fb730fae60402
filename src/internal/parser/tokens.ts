import { createToken, Lexer } from "chevrotain"

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })
export const Star = createToken({ name: "Star", pattern: /[*·⋅.]/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Caret = createToken({ name: "Caret", pattern: /\^/ })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })
export const Exponent = createToken({ name: "Exponent", pattern: /-?\d+/ })
export const SuperscriptExponent = createToken({ name: "SuperscriptExponent", pattern: /⁻?[⁰¹²³⁴⁵⁶⁷⁸⁹]+/ })
export const UnitSymbol = createToken({
  name: "UnitSymbol",
  pattern: /[^\s*·⋅./^()\d⁰¹²³⁴⁵⁶⁷⁸⁹⁻-]+/,
})

export const unitTokens = [
  WhiteSpace,
  Star,
  Slash,
  Caret,
  LParen,
  RParen,
  Exponent,
  SuperscriptExponent,
  UnitSymbol,
] as const

export const UnitLexer = new Lexer([...unitTokens])

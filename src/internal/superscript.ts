const SUPERSCRIPT_DIGITS = "⁰¹²³⁴⁵⁶⁷⁸⁹"
const SUPERSCRIPT_MINUS = "⁻"

export const toSuperscript = (exponent: number): string =>
  String(exponent)
    .split("")
    .map((char) => (char === "-" ? SUPERSCRIPT_MINUS : SUPERSCRIPT_DIGITS[Number(char)] ?? char))
    .join("")

/**
 * Inverse of {@link toSuperscript}; `NaN` when the text holds anything else.
 */
export const fromSuperscript = (text: string): number => {
  let digits = ""
  for (const char of text) {
    if (char === SUPERSCRIPT_MINUS) {
      digits += "-"
      continue
    }
    const index = SUPERSCRIPT_DIGITS.indexOf(char)
    if (index < 0) {
      return Number.NaN
    }
    digits += String(index)
  }
  return digits === "" || digits === "-" ? Number.NaN : Number(digits)
}

const scratch = new DataView(new ArrayBuffer(8))

/**
 * Gap between `|value|` and the next representable double above it. Infinite
 * for `NaN` and the infinities.
 */
export const ulp = (value: number): number => {
  if (!Number.isFinite(value)) {
    return Number.POSITIVE_INFINITY
  }
  const magnitude = Math.abs(value)
  if (magnitude === Number.MAX_VALUE) {
    return 2 ** 971
  }
  scratch.setFloat64(0, magnitude)
  scratch.setBigUint64(0, scratch.getBigUint64(0) + 1n)
  return scratch.getFloat64(0) - magnitude
}

export const halfUlp = (value: number): number => ulp(value) * 0.5

/**
 * True for integers small enough that every neighbour is also representable.
 */
export const isExactInteger = (value: number): boolean =>
  Number.isInteger(value) && Math.abs(value) <= Number.MAX_SAFE_INTEGER

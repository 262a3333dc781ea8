import type { NumericInput, NumericValue } from "../ports/numeric"
import { parseDecimal } from "./decimal"

export type Ordering = -1 | 0 | 1

/**
 * Exact form of a value. Decimals with a huge positive exponent collapse to
 * an infinite float; every bound is far below 10^MAX_EXPONENT.
 */
export type Comparable =
  | { kind: "integer"; value: bigint }
  | { kind: "float"; value: number }
  | { kind: "fraction"; coefficient: bigint; exponent: number }

const MAX_EXPONENT = 400

export function toNumericValue(input: NumericInput): NumericValue {
  if (typeof input === "number") return { kind: "float", value: input }
  if (typeof input === "bigint") return { kind: "integer", value: input }
  return input
}

export function toComparable(input: NumericInput): Comparable {
  const value = toNumericValue(input)
  if (value.kind !== "decimal") return value

  const { coefficient, exponent } = parseDecimal(value.value)
  if (coefficient === 0n) return { kind: "integer", value: 0n }
  if (exponent > MAX_EXPONENT) {
    return { kind: "float", value: coefficient < 0n ? -Infinity : Infinity }
  }
  if (exponent >= 0) return { kind: "integer", value: coefficient * 10n ** BigInt(exponent) }
  return { kind: "fraction", coefficient, exponent }
}

/** `undefined` when the value is NaN and therefore unordered. */
export function compare(value: Comparable, bound: bigint): Ordering | undefined {
  switch (value.kind) {
    case "integer":
      return order(value.value, bound)
    case "float":
      if (Number.isNaN(value.value)) return undefined
      return value.value < bound ? -1 : value.value > bound ? 1 : 0
    case "fraction":
      return compareFraction(value.coefficient, value.exponent, bound)
  }
}

function compareFraction(coefficient: bigint, exponent: number, bound: bigint): Ordering {
  const magnitude = coefficient < 0n ? -coefficient : coefficient
  // |value| < 1 and bound is an integer
  if (magnitude.toString().length + exponent <= 0) {
    if (bound !== 0n) return bound > 0n ? -1 : 1
    return coefficient < 0n ? -1 : 1
  }
  return order(coefficient, bound * 10n ** BigInt(-exponent))
}

function order(a: bigint, b: bigint): Ordering {
  return a < b ? -1 : a > b ? 1 : 0
}

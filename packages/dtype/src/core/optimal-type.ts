import { OutOfRangeError } from "@app-utilities/errors"

import type { SignedTypeName, UnsignedTypeName } from "../ports/dtype-name"
import type { NumericInput } from "../ports/numeric"
import { type Comparable, compare, toComparable, toNumericValue } from "./compare"
import { DTYPE_LIMITS, type Threshold } from "./limits"

/**
 * Smallest signed type whose upper bound holds `value`. Only upper bounds are
 * checked, so any negative value lands in int8.
 *
 * @example optimalSignedType(128) // "int16"
 */
export function optimalSignedType(value: NumericInput): SignedTypeName {
  return select(toComparable(value), DTYPE_LIMITS.signed, "float64")
}

/**
 * Smallest unsigned type for a non-negative `value`. Integer bounds are
 * exclusive, so 255 needs uint16.
 *
 * @throws {OutOfRangeError} when `value` is below zero
 */
export function optimalUnsignedType(value: NumericInput): UnsignedTypeName {
  const comparable = toComparable(value)
  if (compare(comparable, 0n) === -1) {
    throw new OutOfRangeError(`${describe(value)} is negative.`, {
      value: describe(value),
      min: "0",
    })
  }
  return select(comparable, DTYPE_LIMITS.unsigned, "float64")
}

function select<T extends string>(
  value: Comparable,
  limits: readonly Threshold<T>[],
  fallback: T,
): T {
  for (const { type, bound, inclusive } of limits) {
    const ordering = compare(value, bound)
    if (ordering === -1 || (inclusive && ordering === 0)) return type
  }
  return fallback
}

function describe(input: NumericInput): string {
  const value = toNumericValue(input)
  return String(value.value)
}

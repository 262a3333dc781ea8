export { type Comparable, compare, type Ordering, toComparable, toNumericValue } from "./core/compare"
export { decimal, parseDecimal, type ScaledDecimal } from "./core/decimal"
export { DTYPE_LIMITS, type DtypeLimits, FLOAT32_MAX, type Threshold } from "./core/limits"
export { optimalSignedType, optimalUnsignedType } from "./core/optimal-type"
export {
  type DtypeName,
  type SignedTypeName,
  signedTypeNames,
  type UnsignedTypeName,
  unsignedTypeNames,
} from "./ports/dtype-name"
export type { NumericInput, NumericValue } from "./ports/numeric"

import type { SignedTypeName, UnsignedTypeName } from "../ports/dtype-name"

/**
 * Largest finite float32, as the double nearest 3.4028235e38
 * (340282346638528859811704183484516925440).
 */
export const FLOAT32_MAX = BigInt(3.4028235e38)

export type Threshold<T extends string> = Readonly<{
  type: T
  bound: bigint
  /** `true`: values equal to `bound` still fit */
  inclusive: boolean
}>

export type DtypeLimits = Readonly<{
  signed: readonly Threshold<SignedTypeName>[]
  unsigned: readonly Threshold<UnsignedTypeName>[]
}>

function threshold<T extends string>(type: T, bound: bigint, inclusive: boolean): Threshold<T> {
  return Object.freeze({ type, bound, inclusive })
}

/** Checked in order; the first threshold a value fits wins, float64 otherwise. */
export const DTYPE_LIMITS: DtypeLimits = Object.freeze({
  signed: Object.freeze([
    threshold("int8", 127n, true),
    threshold("int16", 32_767n, true),
    threshold("int32", 2_147_483_647n, true),
    threshold("int64", 9_223_372_036_854_775_807n, true),
    threshold("float32", FLOAT32_MAX, true),
  ]),
  unsigned: Object.freeze([
    threshold("uint8", 255n, false),
    threshold("uint16", 65_535n, false),
    threshold("uint32", 4_294_967_295n, false),
    threshold("uint64", 18_446_744_073_709_551_615n, false),
    threshold("float32", FLOAT32_MAX, true),
  ]),
})

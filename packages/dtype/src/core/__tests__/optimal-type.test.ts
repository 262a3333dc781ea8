import { OutOfRangeError } from "@app-utilities/errors"
import type { NumericInput } from "../../ports/numeric"
import { decimal } from "../decimal"
import { DTYPE_LIMITS } from "../limits"
import { optimalSignedType, optimalUnsignedType } from "../optimal-type"

function rangeErrorOf(fn: () => unknown): OutOfRangeError | undefined {
  try {
    fn()
  } catch (err) {
    if (err instanceof OutOfRangeError) return err
    throw err
  }
  return undefined
}

describe("optimalSignedType", () => {
  it.each<[NumericInput, string]>([
    [0, "int8"],
    [127, "int8"],
    [127.5, "int16"],
    [128, "int16"],
    [32_767, "int16"],
    [32_768, "int32"],
    [2_147_483_647, "int32"],
    [2_147_483_648, "int64"],
    [9_223_372_036_854_775_807n, "int64"],
    [9_223_372_036_854_775_808n, "float32"],
    [3.4028235e38, "float32"],
    [3.4028236e38, "float64"],
    [1e40, "float64"],
    [Infinity, "float64"],
  ])("classifies %s as %s", (value, expected) => {
    expect(optimalSignedType(value)).toBe(expected)
  })

  it("classifies 2 ** 63 given as a double past int64", () => {
    expect(optimalSignedType(2 ** 63)).toBe("float32")
  })

  it("checks no lower bound", () => {
    expect(optimalSignedType(-1e10)).toBe("int8")
    expect(optimalSignedType(-Infinity)).toBe("int8")
    expect(optimalSignedType(decimal("-1e400"))).toBe("int8")
  })

  it("falls through to float64 for NaN", () => {
    expect(optimalSignedType(Number.NaN)).toBe("float64")
  })

  it("accepts tagged values of every kind", () => {
    expect(optimalSignedType({ kind: "integer", value: 128n })).toBe("int16")
    expect(optimalSignedType({ kind: "float", value: 127 })).toBe("int8")
    expect(optimalSignedType({ kind: "decimal", value: "32767.0" })).toBe("int16")
  })

  it("compares decimals exactly", () => {
    expect(optimalSignedType(decimal("127.0000000000000000001"))).toBe("int16")
    expect(optimalSignedType(decimal("340282346638528859811704183484516925440"))).toBe("float32")
    // the literal is above the float32 bound, which is the double nearest it
    expect(optimalSignedType(decimal("3.4028235e38"))).toBe("float64")
    expect(optimalSignedType(decimal("1e401"))).toBe("float64")
  })
})

describe("optimalUnsignedType", () => {
  it.each<[NumericInput, string]>([
    [0, "uint8"],
    [-0, "uint8"],
    [254, "uint8"],
    [254.9, "uint8"],
    [255, "uint16"],
    [65_534, "uint16"],
    [65_535, "uint32"],
    [4_294_967_294, "uint32"],
    [4_294_967_295, "uint64"],
    [1e10, "uint64"],
    [18_446_744_073_709_551_614n, "uint64"],
    [18_446_744_073_709_551_615n, "float32"],
    [3.4028235e38, "float32"],
    [1e40, "float64"],
    [Infinity, "float64"],
    [Number.NaN, "float64"],
  ])("classifies %s as %s", (value, expected) => {
    expect(optimalUnsignedType(value)).toBe(expected)
  })

  it("rejects negative values", () => {
    const err = rangeErrorOf(() => optimalUnsignedType(-1))

    expect(err?.message).toBe("-1 is negative.")
    expect(err?.code).toBe("out_of_range")
    expect(err?.context).toEqual({ value: "-1", min: "0" })
  })

  it("rejects negatives of every kind", () => {
    expect(rangeErrorOf(() => optimalUnsignedType(-1n))?.context).toEqual({ value: "-1", min: "0" })
    expect(rangeErrorOf(() => optimalUnsignedType(-Infinity))?.context).toEqual({
      value: "-Infinity",
      min: "0",
    })
    expect(rangeErrorOf(() => optimalUnsignedType(decimal("-0.001")))?.context).toEqual({
      value: "-0.001",
      min: "0",
    })
  })

  it("accepts a negative zero decimal", () => {
    expect(optimalUnsignedType(decimal("-0.0"))).toBe("uint8")
  })
})

describe("DTYPE_LIMITS", () => {
  it("lists thresholds in ascending order", () => {
    expect(DTYPE_LIMITS.signed.map((t) => t.type)).toEqual(["int8", "int16", "int32", "int64", "float32"])
    expect(DTYPE_LIMITS.unsigned.map((t) => t.type)).toEqual([
      "uint8",
      "uint16",
      "uint32",
      "uint64",
      "float32",
    ])
  })

  it("is frozen", () => {
    expect(Object.isFrozen(DTYPE_LIMITS)).toBe(true)
    expect(Object.isFrozen(DTYPE_LIMITS.signed)).toBe(true)
    expect(Object.isFrozen(DTYPE_LIMITS.unsigned)).toBe(true)
  })

  it("freezes every threshold", () => {
    const thresholds = [...DTYPE_LIMITS.signed, ...DTYPE_LIMITS.unsigned]

    expect(thresholds).toHaveLength(10)
    expect(thresholds.every((t) => Object.isFrozen(t))).toBe(true)
  })
})

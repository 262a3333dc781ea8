import { InvalidFormatError } from "@app-utilities/errors"

import type { NumericValue } from "../ports/numeric"

const DECIMAL_LITERAL = /^([+-]?)(?:(\d+)(?:\.(\d*))?|\.(\d+))(?:e([+-]?\d+))?$/i

/** `value = coefficient * 10^exponent`, coefficient carrying the sign. */
export type ScaledDecimal = Readonly<{ coefficient: bigint; exponent: number }>

export function parseDecimal(text: string): ScaledDecimal {
  const match = DECIMAL_LITERAL.exec(text.trim())
  if (!match) {
    throw new InvalidFormatError(`${text} is not a decimal literal.`, {
      expected: "decimal",
      value: text,
    })
  }

  const [, sign, whole = "", pointed, bare, exponent = "0"] = match
  const fraction = pointed ?? bare ?? ""
  const digits = BigInt(`${whole}${fraction}` || "0")

  return {
    coefficient: sign === "-" ? -digits : digits,
    exponent: Number(exponent) - fraction.length,
  }
}

export function decimal(text: string): NumericValue {
  parseDecimal(text)
  return { kind: "decimal", value: text.trim() }
}

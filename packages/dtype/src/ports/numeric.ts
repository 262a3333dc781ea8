/**
 * A numeric value of one of three kinds. Classification only ever looks at
 * the value, so `{ kind: "integer", value: 5n }` and `{ kind: "float", value: 5 }`
 * always land in the same type.
 */
export type NumericValue =
  | { kind: "integer"; value: bigint }
  | { kind: "float"; value: number }
  /** Arbitrary-precision decimal literal, e.g. "127.000000000000000001" or "-4.2e19". */
  | { kind: "decimal"; value: string }

/** Plain `number` is a float and `bigint` an integer. */
export type NumericInput = number | bigint | NumericValue

export const signedTypeNames = ["int8", "int16", "int32", "int64", "float32", "float64"] as const

export const unsignedTypeNames = [
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "float32",
  "float64",
] as const

export type SignedTypeName = (typeof signedTypeNames)[number]
export type UnsignedTypeName = (typeof unsignedTypeNames)[number]
export type DtypeName = SignedTypeName | UnsignedTypeName

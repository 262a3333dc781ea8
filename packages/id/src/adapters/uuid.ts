import { randomUUID } from "node:crypto"
import { InvalidFormatError } from "@app-utilities/errors"
import { v7 } from "uuid"
import type { IdGenerator } from "../ports/id-generator"
import type { Brand } from "../core/brand"
import { type IdCodec, withGenerator } from "../core/id-codec"
import type { IdType } from "../core/id-type"

/** A 128-bit identifier in canonical form: lowercase, hyphenated 8-4-4-4-12. */
export type Uuid = Brand<string, "Uuid">

const CANONICAL = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
const HEX_DIGITS = /^[0-9a-f]{32}$/i
const EDGE_BRACES = /^[{}]+|[{}]+$/g

const isUuid = (v: unknown): v is Uuid => typeof v === "string" && CANONICAL.test(v)

/**
 * Reduce the accepted renderings of a UUID to its canonical form.
 *
 * Accepts `urn:`/`uuid:` prefixes, surrounding braces, any hyphenation and
 * either case. Version and variant bits are not checked.
 */
function canonicalize(text: string): string | undefined {
  const hex = text
    .replaceAll("urn:", "")
    .replaceAll("uuid:", "")
    .replace(EDGE_BRACES, "")
    .replaceAll("-", "")

  if (!HEX_DIGITS.test(hex)) return undefined

  const h = hex.toLowerCase()

  return `${h.slice(0, 8)}-${h.slice(8, 12)}-${h.slice(12, 16)}-${h.slice(16, 20)}-${h.slice(20)}`
}

/**
 * Non-throwing parse: the canonical Uuid, or `undefined` when `value` is not
 * a string or not a UUID rendering.
 */
export function tryParseUuid(value: unknown): Uuid | undefined {
  const canonical = typeof value === "string" ? canonicalize(value) : undefined

  return isUuid(canonical) ? canonical : undefined
}

export const uuidType: IdType<Uuid> = {
  kind: "Uuid",
  is: isUuid,
  parse: (value) => {
    const canonical = tryParseUuid(value)

    if (canonical === undefined) {
      throw new InvalidFormatError(`${String(value)} is not a valid UUID.`, {
        expected: "uuid",
        value,
      })
    }

    return canonical
  },
}

export const uuidV4: IdGenerator<Uuid> = { generate: () => uuidType.parse(randomUUID()) }
export const uuidV7: IdGenerator<Uuid> = { generate: () => uuidType.parse(v7()) }

/**
 * UUID codec: `Uuid.parse`, `Uuid.is`, and `Uuid.generate` (random, v4).
 *
 * @example
 * ```ts
 * const id = Uuid.parse("{3FA85F64-5717-4562-B3FC-2C963F66AFA6}")
 * // "3fa85f64-5717-4562-b3fc-2c963f66afa6"
 * ```
 */
export const Uuid: IdCodec<Uuid> = withGenerator(uuidType, uuidV4)

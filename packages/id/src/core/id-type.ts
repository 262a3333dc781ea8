/**
 * Contract for validating and parsing branded IDs at runtime boundaries.
 *
 * IdType defines how to recognise an ID when data crosses a boundary
 * (a JSON document key, an environment variable, user input).
 *
 * @example
 * ```typescript
 * type TenantId = Brand<string, "TenantId">
 *
 * const isTenantId = (v: unknown): v is TenantId =>
 *   typeof v === "string" && v.startsWith("tnt_")
 *
 * const TenantId: IdType<TenantId> = {
 *   kind: "TenantId",
 *   is: isTenantId,
 *   parse: (v) => {
 *     if (!isTenantId(v)) throw new Error("Invalid TenantId")
 *     return v
 *   },
 * }
 * ```
 */
export interface IdType<T> {
  /** Identifier name for error messages and debugging */
  readonly kind: string

  /**
   * Parse and validate unknown input, returning a branded ID.
   * @throws Implementation-defined error if validation fails
   */
  parse(value: unknown): T

  /** Type guard for non-throwing validation */
  is(value: unknown): value is T
}

import type { AppError, ErrorCode } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Type guard for AppError, optionally narrowed to one code.
 *
 * Structural rather than `instanceof`, so errors from another copy of this
 * package are still recognised.
 *
 * @example
 * ```ts
 * try {
 *   await loadConfigFromPath({ file, requiredKeys, id })
 * } catch (err) {
 *   if (isAppError(err, "missing_fields")) {
 *     console.error(err.context.missing)
 *   }
 * }
 * ```
 */
export function isAppError<C extends ErrorCode>(
  e: unknown,
  code?: C,
): e is AppError & { readonly code: C } {
  if (!isRecord(e)) return false

  const matches =
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.message === "string" &&
    typeof e.name === "string"

  return matches && (code === undefined || e.code === code)
}

export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error.
 * Carries the offending inputs (paths, keys, values) so callers never parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logs and diagnostics.
 *
 * Safe to pass to `JSON.stringify`.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  cause?: SerializedError
  stack?: string
}>

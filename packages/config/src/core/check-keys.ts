import { MissingFieldsError } from "@app-utilities/errors"

/**
 * Ensure every required key is an own key of `record`.
 *
 * All missing keys are reported together, de-duplicated, in the order they
 * first appear in `requiredKeys`.
 *
 * @param recordName - Appended to the message as ` in <recordName>.`
 * @throws MissingFieldsError
 *
 * @example
 * ```ts
 * checkKeysNotMissing(["host", "port"], { host: "db" }, "config")
 * // MissingFieldsError: missing keys port in config.
 * ```
 */
export function checkKeysNotMissing(
  requiredKeys: Iterable<string>,
  record: Readonly<Record<string, unknown>>,
  recordName?: string,
): void {
  const missing = [...new Set(requiredKeys)].filter((key) => !Object.hasOwn(record, key))

  if (missing.length === 0) return

  throw new MissingFieldsError(missing, recordName)
}

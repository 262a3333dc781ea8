import { parse } from "dotenv"

/**
 * Parse `KEY=VALUE` lines into a map.
 *
 * Surrounding quotes are removed; blank lines and `#` comments are ignored.
 *
 * @example
 * ```ts
 * envStringToDict("FOO=bar\nBAZ=\"qux\"\n")
 * // { FOO: "bar", BAZ: "qux" }
 * ```
 */
export function envStringToDict(envString: string): Record<string, string> {
  return parse(envString)
}

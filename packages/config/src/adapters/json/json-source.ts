import fs from "node:fs/promises"
import path from "node:path"
import { NotFoundError, UnsupportedFormatError } from "@app-utilities/errors"
import { isMissingPathError } from "../../core/fs-errors"
import { isJsonObject, type JsonObject } from "../../ports/json"
import type { ConfigSource } from "../../ports/source"

/**
 * Options for creating a JSON configuration source.
 */
export type JsonSourceOptions = {
  /**
   * Path to the JSON file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "settings.json", "./config/app.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Rejects with NotFoundError if the file is missing.
   * - `false`: Returns `{}` if the file is missing.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string | undefined
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  /**
   * Reads the whole file once and decodes it with `JSON.parse`. The decoded
   * object is returned as is: a `__proto__` field stays an own field, an
   * out-of-range number such as `1e400` becomes `Infinity` and integers
   * beyond `Number.MAX_SAFE_INTEGER` are rounded to the nearest double.
   *
   * @throws NotFoundError when a required file is missing.
   * @throws UnsupportedFormatError when the content is not JSON or its top level is not an object.
   */
  async load(): Promise<JsonObject> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)
    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!isMissingPathError(err)) throw err
      if (!this.opts.required) return {}

      throw new NotFoundError(filePath)
    }

    return decodeJsonObject(content, filePath)
  }
}

function decodeJsonObject(content: string, filePath: string): JsonObject {
  let decoded: unknown

  try {
    decoded = JSON.parse(content)
  } catch (err) {
    throw new UnsupportedFormatError(filePath, "is not valid JSON.", err)
  }

  if (!isJsonObject(decoded)) {
    throw new UnsupportedFormatError(filePath, "must contain a JSON object at the top level.")
  }

  return decoded
}

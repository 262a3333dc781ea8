import fs from "node:fs/promises"
import path from "node:path"
import { KeyNotFoundError, NotFoundError, UnsupportedFormatError } from "@app-utilities/errors"
import { tryParseUuid, type Uuid } from "@app-utilities/id"
import { createNullLogger, type Logger } from "@app-utilities/logger"
import { JsonSource } from "../adapters/json/json-source"
import { isJsonObject, type JsonObject, type JsonValue } from "../ports/json"
import { checkKeysNotMissing } from "./check-keys"
import { isMissingPathError } from "./fs-errors"

export type LoadConfigFromPathOptions = {
  /** Path to the `.json` document, absolute or relative to `cwd`. */
  file: string

  /** Keys the matched record must contain. */
  requiredKeys: Iterable<string>

  /** Identifier of the record to return. */
  id: Uuid

  /** @default process.cwd() */
  cwd?: string | undefined

  logger?: Logger | undefined
}

/**
 * Load the configuration record stored under `id` in a JSON document.
 *
 * The document maps UUID strings to records. Keys are compared as UUIDs, so
 * `{3FA85F64-...}` matches `3fa85f64-...`. Keys that are not UUIDs are skipped.
 *
 * Numbers are decoded as JSON numbers: integers beyond
 * `Number.MAX_SAFE_INTEGER` lose precision, so store such values as strings.
 *
 * @returns The matched record, unchanged (extra keys kept).
 * @throws NotFoundError when `file` is not an existing regular file.
 * @throws UnsupportedFormatError when `file` is not `.json`, is not a JSON
 * object, or the matched entry is not an object.
 * @throws KeyNotFoundError when no key matches `id`.
 * @throws MissingFieldsError when the record lacks any of `requiredKeys`.
 *
 * @example
 * ```ts
 * const config = await loadConfigFromPath({
 *   file: "configs.json",
 *   requiredKeys: ["host", "port"],
 *   id: Uuid.parse(process.env.APP_ID),
 * })
 * ```
 */
export async function loadConfigFromPath({
  file,
  requiredKeys,
  id,
  cwd = process.cwd(),
  logger = createNullLogger(),
}: LoadConfigFromPathOptions): Promise<JsonObject> {
  const filePath = path.resolve(cwd, file)
  const log = logger.child({ module: "config", operation: "loadConfigFromPath", file: filePath })

  if (!(await isFile(filePath))) {
    throw new NotFoundError(filePath)
  }

  if (path.extname(filePath) !== ".json") {
    throw new UnsupportedFormatError(filePath, "must be a .json file.")
  }

  const configs = await new JsonSource({ file: filePath, required: true }).load()
  const entry = findEntry(configs, id, log)

  if (entry === undefined) {
    throw new KeyNotFoundError(id, "config file")
  }

  if (!isJsonObject(entry)) {
    throw new UnsupportedFormatError(filePath, `entry ${id} must be a JSON object.`)
  }

  checkKeysNotMissing(requiredKeys, entry, "config")

  log.info("config loaded", { configId: id })

  return entry
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath)

    return stats.isFile()
  } catch (err) {
    if (isMissingPathError(err)) return false
    throw err
  }
}

/** First entry, in document order, whose key parses to `id`. */
function findEntry(configs: JsonObject, id: Uuid, log: Logger): JsonValue | undefined {
  for (const [key, value] of Object.entries(configs)) {
    const candidate = tryParseUuid(key)

    if (candidate === undefined) {
      log.debug("skipping key that is not a uuid", { key })
      continue
    }

    if (candidate === id) return value
  }

  return undefined
}

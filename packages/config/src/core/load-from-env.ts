import { InvalidFormatError, NotFoundError } from "@app-utilities/errors"
import { tryParseUuid, type Uuid } from "@app-utilities/id"
import { createNullLogger, type Logger } from "@app-utilities/logger"
import { EnvSource } from "../adapters/env/env-source"
import type { JsonObject } from "../ports/json"
import type { ConfigSource } from "../ports/source"
import { loadConfigFromPath } from "./load-config"
import { type MergedSources, mergeSources } from "./merge-sources"

export type LoadIdFromEnvOptions = {
  /**
   * Where variables are looked up; later sources win.
   * @default [new EnvSource()]
   */
  sources?: readonly ConfigSource[] | undefined

  logger?: Logger | undefined
}

/**
 * Read a UUID from an environment-like source.
 *
 * @throws NotFoundError when `variable` is not set in any source.
 * @throws InvalidFormatError when its value is not a UUID.
 */
export async function loadIdFromEnv(
  variable: string,
  { sources = [new EnvSource()], logger = createNullLogger() }: LoadIdFromEnvOptions = {},
): Promise<Uuid> {
  const merged = await mergeSources(sources)
  const id = readId(merged, variable)

  logger.debug("id resolved", {
    module: "config",
    variable,
    source: Object.hasOwn(merged.provenance, variable) ? merged.provenance[variable] : undefined,
  })

  return id
}

export type LoadConfigFromEnvOptions = LoadIdFromEnvOptions & {
  /** Variable holding the record's UUID. */
  idVariable: string

  /** Variable holding the path to the JSON document. */
  pathVariable: string

  requiredKeys: Iterable<string>

  /** Base directory for a relative path. @default process.cwd() */
  cwd?: string | undefined
}

/**
 * Resolve the document path and record id from the sources, then
 * {@link loadConfigFromPath}.
 */
export async function loadConfigFromEnv({
  idVariable,
  pathVariable,
  requiredKeys,
  sources = [new EnvSource()],
  cwd,
  logger = createNullLogger(),
}: LoadConfigFromEnvOptions): Promise<JsonObject> {
  const merged = await mergeSources(sources)
  const id = readId(merged, idVariable)
  const file = readVariable(merged, pathVariable)

  if (typeof file !== "string") {
    throw new InvalidFormatError(`The value of ${pathVariable} is not a path.`, {
      expected: "path",
      value: file,
    })
  }

  logger.debug("config location resolved", {
    module: "config",
    file,
    configId: id,
    source: Object.hasOwn(merged.provenance, pathVariable)
      ? merged.provenance[pathVariable]
      : undefined,
  })

  return loadConfigFromPath({ file, requiredKeys, id, cwd, logger })
}

function readVariable({ values }: MergedSources, variable: string): unknown {
  const value = Object.hasOwn(values, variable) ? values[variable] : undefined

  if (value === undefined) {
    throw new NotFoundError(variable, `${variable} not found in environment variables.`)
  }

  return value
}

function readId(merged: MergedSources, variable: string): Uuid {
  const value = readVariable(merged, variable)
  const id = tryParseUuid(value)

  if (id === undefined) {
    throw new InvalidFormatError(`The value of ${variable} is not a valid UUID.`, {
      expected: "uuid",
      value,
    })
  }

  return id
}

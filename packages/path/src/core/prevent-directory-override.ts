import fs from "node:fs/promises"
import path from "node:path"
import { createNullLogger, type Logger } from "@app-utilities/logger"
import { isAlreadyExistsError } from "./fs-errors"

export type PreventDirectoryOverrideOptions = {
  logger?: Logger | undefined
}

/**
 * Create `directory`, or `<directory> 0`, `<directory> 1`, ... when the name
 * is taken by a directory or a file. Missing parents are created.
 *
 * @returns The path that was created, in the same form as `directory`.
 *
 * @example
 * ```ts
 * await preventDirectoryOverride("output") // "output"
 * await preventDirectoryOverride("output") // "output 0"
 * ```
 */
export async function preventDirectoryOverride(
  directory: string,
  { logger = createNullLogger() }: PreventDirectoryOverrideOptions = {},
): Promise<string> {
  const log = logger.child({ module: "path", operation: "preventDirectoryOverride" })
  const parent = path.dirname(directory)
  const base = path.join(parent, path.basename(directory))

  await fs.mkdir(parent, { recursive: true })

  for (let n = 0; ; n++) {
    const candidate = n === 0 ? base : `${base} ${n - 1}`

    try {
      await fs.mkdir(candidate)
    } catch (err) {
      if (!isAlreadyExistsError(err)) throw err

      log.debug("directory name taken", { directory: candidate })
      continue
    }

    log.info("directory created", { directory: candidate })

    return candidate
  }
}

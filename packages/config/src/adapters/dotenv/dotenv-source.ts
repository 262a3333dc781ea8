import fs from "node:fs/promises"
import path from "node:path"
import { NotFoundError } from "@app-utilities/errors"
import { parse } from "dotenv"
import { isMissingPathError } from "../../core/fs-errors"
import type { ConfigSource } from "../../ports/source"

/**
 * Options for creating a dotenv configuration source.
 */
export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production"
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
   * @default process.cwd()
   */
  cwd?: string | undefined
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, string>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return parse(content)
    } catch (err) {
      if (!isMissingPathError(err)) throw err
      if (!this.opts.required) return {}

      throw new NotFoundError(filePath)
    }
  }
}

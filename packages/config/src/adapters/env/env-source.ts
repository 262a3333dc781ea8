import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Keep only variables starting with this prefix, and strip it:
   * with `"APP_"`, `APP_CONFIG_ID` is read as `CONFIG_ID`.
   */
  prefix?: string | undefined

  /** Variables to read instead of the process environment. @default process.env */
  env?: Record<string, string | undefined> | undefined
}

/**
 * Environment variables as a config source. The default source of
 * `loadIdFromEnv` and `loadConfigFromEnv`.
 *
 * `load()` returns a copy taken at call time, so later changes to the
 * environment are seen by the next load and never by a returned map.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor({ prefix = "", env = process.env }: EnvSourceOptions = {}) {
    this.prefix = prefix
    this.env = env
  }

  async load(): Promise<Record<string, string | undefined>> {
    const entries = Object.entries(this.env)
      .filter(([key]) => key.startsWith(this.prefix))
      .map(([key, value]) => [key.slice(this.prefix.length), value] as const)

    return Object.fromEntries(entries)
  }
}

/**
 * A source of configuration values: a key-value lookup the loaders read from
 * instead of touching `process.env` or the file system directly.
 *
 * Sources only load raw values. They do not validate or merge.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "dotenv:.env.local", "json:settings.json"
   */
  readonly name: string

  /**
   * Load configuration values.
   *
   * - Env/dotenv sources return flat string values
   * - JSON sources may return nested values
   * - `undefined` for a key means "not provided"
   * - Every call returns a fresh object
   */
  load(): Promise<Record<string, unknown>>
}

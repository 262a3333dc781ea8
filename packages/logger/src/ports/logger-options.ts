import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Pretty-print for local development instead of emitting JSON lines.
   */
  prettify?: boolean
}

import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * Adapters must honor these options but are free to choose how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" suppresses the per-growth "debug" entries tables emit.
   */
  level: LogLevelName

  /**
   * Pretty-print output for humans instead of emitting JSON lines.
   * Intended for local debugging only.
   */
  prettify?: boolean
}

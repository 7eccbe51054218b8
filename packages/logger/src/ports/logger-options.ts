import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit; e.g. "info" drops "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output through pino-pretty. Meant for local runs; leave
   * off where logs are shipped as JSON.
   */
  prettify?: boolean
}

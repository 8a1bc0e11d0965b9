import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Minimum level to emit. */
  level: LogLevelName

  /**
   * Pretty-print output through `pino-pretty`. Meant for local development;
   * keep JSON lines in production.
   */
  prettify?: boolean
}

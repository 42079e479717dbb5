import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output through pino-pretty. Meant for local runs;
   * ignored when an explicit destination stream is supplied.
   */
  prettify?: boolean
}

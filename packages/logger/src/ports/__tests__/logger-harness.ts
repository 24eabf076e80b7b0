import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** One emitted entry: its level, message and every structured field. */
export type LogEntry = {
  level: LogLevelName
  msg: string
  fields: Record<string, unknown>
}

export type LoggerFixture = {
  logger: Logger
  entries: () => LogEntry[]
  reset: () => void
}

/** Builds loggers of one adapter for the shared contract suite. */
export type LoggerHarness = {
  adapter: string
  create: (level?: LogLevelName) => LoggerFixture
}

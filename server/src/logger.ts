import {
  configure,
  getConsoleSink,
  getLogger,
  type Logger,
  type LogLevel,
} from "@logtape/logtape"

export async function configureLogger(level: LogLevel): Promise<Logger> {
  // Configure LogTape for server-side logging
  await configure({
    sinks: { console: getConsoleSink() },
    filters: {},
    loggers: [
      {
        category: ["tasklist"],
        lowestLevel: level,
        sinks: ["console"],
      },
      {
        category: ["logtape", "meta"],
        lowestLevel: "warning",
        sinks: ["console"],
      },
    ],
  })

  const logger = getLogger(["tasklist", "server"])

  logger.debug`Logger configured`

  return logger
}

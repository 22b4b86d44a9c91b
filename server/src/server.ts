import {
  openDatabase,
  PostgresTaskStore,
  redactDatabaseUrl,
} from "@tasklist/adapter-postgres"
import { createTaskHandlers } from "@tasklist/tasks"
import dotenv from "dotenv"
import { createApp } from "./app.js"
import { loadConfig } from "./config.js"
import { configureLogger } from "./logger.js"

dotenv.config()

const config = loadConfig()
const logger = await configureLogger(config.logLevel)

// 1. Open the database and make sure the table exists before serving.
const database = await openDatabase(config.databaseUrl)
logger.info("Database opened: {url} ({engine})", {
  url: redactDatabaseUrl(config.databaseUrl),
  engine: database.kind,
})

const store = new PostgresTaskStore({ database })
await store.init()

// 2. Build the app around explicitly constructed handlers.
const app = createApp({
  handlers: createTaskHandlers({ store, logger: logger.getChild("tasks") }),
  logger,
  corsOrigin: config.corsOrigin,
})

const server = app.listen(config.port, config.host, () => {
  logger.info("Task Manager API listening on http://{host}:{port}", {
    host: config.host,
    port: config.port,
  })
})

async function shutdown(signal: string): Promise<void> {
  logger.info("Received {signal}, shutting down", { signal })
  await new Promise<void>((resolve, reject) =>
    server.close(error => (error ? reject(error) : resolve())),
  )
  await store.close()
  logger.info`Shutdown complete`
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      error => {
        logger.error("Shutdown failed: {error}", { error })
        process.exit(1)
      },
    )
  })
}

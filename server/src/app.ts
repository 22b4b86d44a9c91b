import type { Logger } from "@logtape/logtape"
import {
  createTaskExpressRouter,
  jsonErrorHandler,
  requestLogger,
} from "@tasklist/adapter-express"
import type { TaskHandlers } from "@tasklist/tasks"
import cors from "cors"
import express, { type Express } from "express"

export const SERVICE_NAME = "Task Manager API"
export const SERVICE_VERSION = "1.0.0"

export interface AppOptions {
  handlers: TaskHandlers
  logger: Logger

  /**
   * Value for Access-Control-Allow-Origin.
   * @default "*"
   */
  corsOrigin?: string
}

export function createApp(options: AppOptions): Express {
  const { handlers, logger, corsOrigin = "*" } = options

  const app = express()
  app.disable("x-powered-by")
  app.use(cors({ origin: corsOrigin }))
  app.use(express.json())
  app.use(requestLogger(logger.getChild("http")))

  app.get("/", (_req, res) => {
    res.json({
      message: SERVICE_NAME,
      version: SERVICE_VERSION,
      api: "/api",
    })
  })

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", message: `${SERVICE_NAME} is running` })
  })

  app.use("/api", createTaskExpressRouter(handlers))

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" })
  })

  app.use(jsonErrorHandler(logger))

  return app
}

import type { TaskHandlerResult, TaskHandlers } from "@tasklist/tasks"
import type { NextFunction, Request, Response, Router } from "express"
import express from "express"

export interface TaskExpressRouterOptions {
  /**
   * Path of the task collection; single tasks live at `${tasksPath}/:id`.
   * @default "/tasks"
   */
  tasksPath?: string
}

function sendResult(res: Response, result: TaskHandlerResult): void {
  if (result.status === 204) {
    res.status(204).end()
    return
  }
  res.status(result.status).json(result.body)
}

/**
 * Adapt a handler to Express: run it, send its result, and pass anything it
 * throws to the error middleware.
 */
function route(handle: (req: Request) => Promise<TaskHandlerResult>) {
  return (req: Request, res: Response, next: NextFunction) => {
    handle(req)
      .then(result => sendResult(res, result))
      .catch(next)
  }
}

/**
 * Create an Express router for the task handlers.
 *
 * The handlers do all validation and storage work; this router only maps
 * routes to handlers and results to responses. Mount it behind
 * `express.json()`.
 *
 * @example
 * ```typescript
 * const handlers = createTaskHandlers({ store })
 *
 * app.use(express.json())
 * app.use("/api", createTaskExpressRouter(handlers))
 * ```
 */
export function createTaskExpressRouter(
  handlers: TaskHandlers,
  options: TaskExpressRouterOptions = {},
): Router {
  const { tasksPath = "/tasks" } = options
  const taskPath = `${tasksPath}/:id`

  const router = express.Router()

  router.get(
    tasksPath,
    route(() => handlers.listTasks()),
  )

  router.get(
    taskPath,
    route(req => handlers.getTask(req.params.id)),
  )

  router.post(
    tasksPath,
    route(req => handlers.createTask(req.body)),
  )

  router.put(
    taskPath,
    route(req => handlers.updateTask(req.params.id, req.body)),
  )

  router.delete(
    taskPath,
    route(req => handlers.deleteTask(req.params.id)),
  )

  return router
}

/**
 * Framework-agnostic request handlers for the task API (Functional Core).
 *
 * Each handler takes raw request input (path id, parsed JSON body), validates
 * it, talks to the TaskStore and returns a result describing the response.
 * Handlers never throw: framework adapters (Express, ...) only translate the
 * result into an HTTP response.
 */

import { getLogger, type Logger } from "@logtape/logtape"
import { StorageError } from "./errors.js"
import type { TaskStore } from "./task-store.js"
import { toTaskUpdate } from "./task-update.js"
import {
  CreateTaskBodySchema,
  type Task,
  type TaskId,
  TaskIdSchema,
  toNewTask,
  toValidationIssues,
  UpdateTaskBodySchema,
  type ValidationIssue,
} from "./types.js"

export interface ErrorBody {
  error: string
  issues?: ValidationIssue[]
}

export type ErrorResult<S extends 404 | 422 | 500 = 404 | 422 | 500> = {
  status: S
  body: ErrorBody
}

export type ListTasksResult = { status: 200; body: Task[] } | ErrorResult<500>
export type TaskResult = { status: 200; body: Task } | ErrorResult
export type CreateTaskResult = { status: 201; body: Task } | ErrorResult<422 | 500>
export type DeleteTaskResult = { status: 204 } | ErrorResult

export type TaskHandlerResult =
  | ListTasksResult
  | TaskResult
  | CreateTaskResult
  | DeleteTaskResult

export interface TaskHandlers {
  listTasks(): Promise<ListTasksResult>
  getTask(rawId: string): Promise<TaskResult>
  createTask(body: unknown): Promise<CreateTaskResult>
  updateTask(rawId: string, body: unknown): Promise<TaskResult>
  deleteTask(rawId: string): Promise<DeleteTaskResult>
}

export interface TaskHandlerOptions {
  store: TaskStore

  /**
   * Logger for request outcomes and storage failures.
   * @default getLogger(["tasklist", "handlers"])
   */
  logger?: Logger
}

type IdResult =
  | { type: "valid"; id: TaskId }
  | { type: "invalid"; result: ErrorResult<422> }

function parseTaskId(rawId: string): IdResult {
  const parsed = TaskIdSchema.safeParse(rawId)
  if (!parsed.success) {
    return {
      type: "invalid",
      result: invalid("Invalid task id", toValidationIssues(parsed.error)),
    }
  }
  return { type: "valid", id: parsed.data }
}

function invalid(error: string, issues: ValidationIssue[]): ErrorResult<422> {
  return { status: 422, body: { error, issues } }
}

function notFound(id: TaskId): ErrorResult<404> {
  return { status: 404, body: { error: `Task with id ${id} not found` } }
}

function serverError(error: string): ErrorResult<500> {
  return { status: 500, body: { error } }
}

/**
 * Create the five task handlers over a store.
 *
 * @example
 * ```typescript
 * const handlers = createTaskHandlers({ store: new InMemoryTaskStore() })
 * const result = await handlers.createTask({ title: "Buy milk" })
 * // { status: 201, body: { id: 1, title: "Buy milk", description: null, completed: false } }
 * ```
 */
export function createTaskHandlers(options: TaskHandlerOptions): TaskHandlers {
  const { store, logger = getLogger(["tasklist", "handlers"]) } = options

  function logFailure(message: string, error: unknown, taskId?: TaskId) {
    const context = error instanceof StorageError ? error.context : undefined
    logger.error(`${message}: {error}`, { taskId, context, error })
  }

  return {
    async listTasks() {
      try {
        const tasks = await store.list()
        logger.info("Retrieved {count} tasks", { count: tasks.length })
        return { status: 200, body: tasks }
      } catch (error) {
        logFailure("Error fetching tasks", error)
        return serverError("Failed to fetch tasks")
      }
    },

    async getTask(rawId) {
      const parsedId = parseTaskId(rawId)
      if (parsedId.type === "invalid") return parsedId.result
      const { id } = parsedId

      try {
        const task = await store.get(id)
        if (!task) {
          logger.warn("Task {taskId} not found", { taskId: id })
          return notFound(id)
        }
        return { status: 200, body: task }
      } catch (error) {
        logFailure(`Error fetching task ${id}`, error, id)
        return serverError("Failed to fetch task")
      }
    },

    async createTask(body) {
      const parsed = CreateTaskBodySchema.safeParse(body)
      if (!parsed.success) {
        return invalid(
          "Invalid request body",
          toValidationIssues(parsed.error),
        )
      }

      try {
        const task = await store.create(toNewTask(parsed.data))
        logger.info("Task created with id {taskId}", { taskId: task.id })
        return { status: 201, body: task }
      } catch (error) {
        logFailure("Error creating task", error)
        return serverError("Failed to create task")
      }
    },

    async updateTask(rawId, body) {
      const parsedId = parseTaskId(rawId)
      if (parsedId.type === "invalid") return parsedId.result
      const { id } = parsedId

      const parsed = UpdateTaskBodySchema.safeParse(body)
      if (!parsed.success) {
        return invalid(
          "Invalid request body",
          toValidationIssues(parsed.error),
        )
      }

      try {
        const task = await store.update(id, toTaskUpdate(parsed.data))
        if (!task) {
          logger.warn("Task {taskId} not found for update", { taskId: id })
          return notFound(id)
        }
        logger.info("Task {taskId} updated", { taskId: id })
        return { status: 200, body: task }
      } catch (error) {
        logFailure(`Error updating task ${id}`, error, id)
        return serverError("Failed to update task")
      }
    },

    async deleteTask(rawId) {
      const parsedId = parseTaskId(rawId)
      if (parsedId.type === "invalid") return parsedId.result
      const { id } = parsedId

      try {
        const deleted = await store.delete(id)
        if (!deleted) {
          logger.warn("Task {taskId} not found for deletion", { taskId: id })
          return notFound(id)
        }
        logger.info("Task {taskId} deleted", { taskId: id })
        return { status: 204 }
      } catch (error) {
        logFailure(`Error deleting task ${id}`, error, id)
        return serverError("Failed to delete task")
      }
    },
  }
}

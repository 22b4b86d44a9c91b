import type { TaskId } from "./types.js"

export type StorageOperation = "init" | "list" | "get" | "create" | "update" | "delete"

export interface StorageErrorContext {
  operation: StorageOperation
  taskId?: TaskId
}

/**
 * Any failure raised by the persistence layer, with the driver's error kept
 * as `cause`. Handlers log these in full and answer with a generic 500.
 */
export class StorageError extends Error {
  public readonly context: StorageErrorContext

  constructor(
    message: string,
    context: StorageErrorContext,
    options?: { cause?: unknown },
  ) {
    const contextStr = Object.entries(context)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(", ")
    super(`${message} (${contextStr})`, options)
    this.name = "StorageError"
    this.context = context
  }
}

import type { TaskUpdate } from "./task-update.js"
import type { NewTask, Task, TaskId } from "./types.js"

/**
 * Persistence port for tasks.
 *
 * Not-found is part of the return type rather than an error: `get` and
 * `update` resolve to `undefined`, `delete` to `false`. Every other failure
 * rejects with a `StorageError`. Each mutating call is a single
 * commit-or-rollback unit; a rejected call leaves storage unchanged.
 */
export interface TaskStore {
  /** All tasks in id order */
  list(): Promise<Task[]>

  get(id: TaskId): Promise<Task | undefined>

  /** Insert a task; storage assigns the id */
  create(task: NewTask): Promise<Task>

  /** Apply a merge-patch; only fields marked `set` change */
  update(id: TaskId, update: TaskUpdate): Promise<Task | undefined>

  delete(id: TaskId): Promise<boolean>

  close(): Promise<void>
}

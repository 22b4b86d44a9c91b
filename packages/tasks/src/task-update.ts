import type { Task, UpdateTaskBody } from "./types.js"

/**
 * One field of a merge-patch update: either left as stored, or set to a value.
 * For nullable fields `null` is a value like any other, so "absent" and
 * "explicitly null" stay distinct.
 */
export type FieldUpdate<T> =
  | { readonly type: "unchanged" }
  | { readonly type: "set"; readonly value: T }

export interface TaskUpdate {
  title: FieldUpdate<string>
  description: FieldUpdate<string | null>
  completed: FieldUpdate<boolean>
}

const UNCHANGED = { type: "unchanged" } as const

function fieldUpdate<T>(value: T | undefined): FieldUpdate<T> {
  return value === undefined ? UNCHANGED : { type: "set", value }
}

/**
 * Build a TaskUpdate from a validated body. JSON cannot carry `undefined`,
 * so an `undefined` property here always means the key was omitted.
 */
export function toTaskUpdate(body: UpdateTaskBody): TaskUpdate {
  return {
    title: fieldUpdate(body.title),
    description: fieldUpdate(body.description),
    completed: fieldUpdate(body.completed),
  }
}

export function isEmptyUpdate(update: TaskUpdate): boolean {
  return (
    update.title.type === "unchanged" &&
    update.description.type === "unchanged" &&
    update.completed.type === "unchanged"
  )
}

export function applyTaskUpdate(task: Task, update: TaskUpdate): Task {
  return {
    id: task.id,
    title: update.title.type === "set" ? update.title.value : task.title,
    description:
      update.description.type === "set"
        ? update.description.value
        : task.description,
    completed:
      update.completed.type === "set" ? update.completed.value : task.completed,
  }
}

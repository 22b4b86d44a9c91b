import type { TaskStore } from "./task-store.js"
import { applyTaskUpdate, type TaskUpdate } from "./task-update.js"
import type { NewTask, Task, TaskId } from "./types.js"

/**
 * TaskStore kept in a Map. Ids are assigned from a counter starting at 1 and
 * are never reused, matching a SERIAL column.
 */
export class InMemoryTaskStore implements TaskStore {
  #tasks = new Map<TaskId, Task>()
  #nextId = 1

  constructor(initialTasks: NewTask[] = []) {
    for (const task of initialTasks) {
      this.#insert(task)
    }
  }

  async list(): Promise<Task[]> {
    return [...this.#tasks.values()]
      .sort((a, b) => a.id - b.id)
      .map(task => ({ ...task }))
  }

  async get(id: TaskId): Promise<Task | undefined> {
    const task = this.#tasks.get(id)
    return task ? { ...task } : undefined
  }

  async create(task: NewTask): Promise<Task> {
    return { ...this.#insert(task) }
  }

  async update(id: TaskId, update: TaskUpdate): Promise<Task | undefined> {
    const existing = this.#tasks.get(id)
    if (!existing) {
      return undefined
    }

    const updated = applyTaskUpdate(existing, update)
    this.#tasks.set(id, updated)
    return { ...updated }
  }

  async delete(id: TaskId): Promise<boolean> {
    return this.#tasks.delete(id)
  }

  async close(): Promise<void> {
    this.#tasks.clear()
  }

  #insert(task: NewTask): Task {
    const created: Task = { id: this.#nextId++, ...task }
    this.#tasks.set(created.id, created)
    return created
  }
}

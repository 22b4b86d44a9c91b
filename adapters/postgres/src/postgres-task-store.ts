import { getLogger, type Logger } from "@logtape/logtape"
import {
  applyTaskUpdate,
  isEmptyUpdate,
  type NewTask,
  StorageError,
  type StorageOperation,
  type Task,
  type TaskId,
  TaskSchema,
  type TaskStore,
  type TaskUpdate,
} from "@tasklist/tasks"
import type { Database, QueryInterface } from "./database.js"

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/

/**
 * Options for creating a PostgresTaskStore
 */
export interface PostgresTaskStoreOptions {
  database: Database

  /** Table name (default: 'tasks') */
  tableName?: string

  /** Auto-create table if not exists (default: true) */
  createTable?: boolean

  logger?: Logger
}

/**
 * TaskStore over a relational database (PostgreSQL or PGlite).
 *
 * Every call holds one session for its duration. Reads run a single query;
 * mutations run inside one transaction that locks the row before writing,
 * so a not-found answer is decided before anything is written.
 *
 * @example
 * ```typescript
 * const database = await openDatabase("file:./data/tasks")
 * const store = new PostgresTaskStore({ database })
 * await store.init()
 * ```
 */
export class PostgresTaskStore implements TaskStore {
  readonly #database: Database
  readonly #tableName: string
  readonly #createTable: boolean
  readonly #logger: Logger
  #initialized = false

  constructor(options: PostgresTaskStoreOptions) {
    const tableName = options.tableName ?? "tasks"
    if (!TABLE_NAME_PATTERN.test(tableName)) {
      throw new Error(`Invalid table name: ${tableName}`)
    }

    this.#database = options.database
    this.#tableName = tableName
    this.#createTable = options.createTable ?? true
    this.#logger =
      options.logger ?? getLogger(["tasklist", "storage", "postgres"])
  }

  /**
   * Ensure the table exists. Called once at startup, before any request is
   * served; every other operation also calls it on first use.
   */
  async init(): Promise<void> {
    await this.#run("init", undefined, () => this.#ensureTable())
  }

  async list(): Promise<Task[]> {
    return this.#run("list", undefined, async () => {
      const result = await this.#database.withSession(session =>
        session.query(
          `SELECT id, title, description, completed FROM ${this.#tableName} ORDER BY id`,
        ),
      )
      return result.rows.map(row => TaskSchema.parse(row))
    })
  }

  async get(id: TaskId): Promise<Task | undefined> {
    return this.#run("get", id, () =>
      this.#database.withSession(session => this.#select(session, id, false)),
    )
  }

  async create(task: NewTask): Promise<Task> {
    return this.#run("create", undefined, () =>
      this.#database.withSession(session =>
        session.transaction(async tx => {
          const result = await tx.query(
            `INSERT INTO ${this.#tableName} (title, description, completed)
             VALUES ($1, $2, $3)
             RETURNING id, title, description, completed`,
            [task.title, task.description, task.completed],
          )
          return TaskSchema.parse(result.rows[0])
        }),
      ),
    )
  }

  async update(id: TaskId, update: TaskUpdate): Promise<Task | undefined> {
    return this.#run("update", id, () =>
      this.#database.withSession(session =>
        session.transaction(async tx => {
          const existing = await this.#select(tx, id, true)
          if (!existing || isEmptyUpdate(update)) {
            return existing
          }

          const merged = applyTaskUpdate(existing, update)
          const result = await tx.query(
            `UPDATE ${this.#tableName}
             SET title = $2, description = $3, completed = $4
             WHERE id = $1
             RETURNING id, title, description, completed`,
            [id, merged.title, merged.description, merged.completed],
          )
          return TaskSchema.parse(result.rows[0])
        }),
      ),
    )
  }

  async delete(id: TaskId): Promise<boolean> {
    return this.#run("delete", id, () =>
      this.#database.withSession(session =>
        session.transaction(async tx => {
          const existing = await this.#select(tx, id, true)
          if (!existing) {
            return false
          }

          await tx.query(`DELETE FROM ${this.#tableName} WHERE id = $1`, [id])
          return true
        }),
      ),
    )
  }

  async close(): Promise<void> {
    await this.#database.close()
  }

  async #ensureTable(): Promise<void> {
    if (this.#initialized || !this.#createTable) {
      return
    }

    await this.#database.withSession(session =>
      session.query(`
        CREATE TABLE IF NOT EXISTS ${this.#tableName} (
          id SERIAL PRIMARY KEY,
          title TEXT NOT NULL CHECK (length(title) > 0),
          description TEXT,
          completed BOOLEAN NOT NULL DEFAULT FALSE
        )
      `),
    )

    this.#initialized = true
    this.#logger.info("Table {tableName} ready", {
      tableName: this.#tableName,
      engine: this.#database.kind,
    })
  }

  async #select(
    queryable: QueryInterface,
    id: TaskId,
    forUpdate: boolean,
  ): Promise<Task | undefined> {
    const result = await queryable.query(
      `SELECT id, title, description, completed FROM ${this.#tableName} WHERE id = $1${forUpdate ? " FOR UPDATE" : ""}`,
      [id],
    )
    if (result.rows.length === 0) {
      return undefined
    }
    return TaskSchema.parse(result.rows[0])
  }

  /**
   * Run an operation once the table exists, rethrowing any failure as a
   * StorageError.
   */
  async #run<T>(
    operation: StorageOperation,
    taskId: TaskId | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      if (operation !== "init") {
        await this.#ensureTable()
      }
      return await fn()
    } catch (error) {
      if (error instanceof StorageError) throw error
      throw new StorageError(
        `Task storage ${operation} failed`,
        { operation, taskId },
        { cause: error },
      )
    }
  }
}

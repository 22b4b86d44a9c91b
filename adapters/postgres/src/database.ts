import { PGlite } from "@electric-sql/pglite"
import pg from "pg"

/**
 * Minimal interface for query execution - works with pg clients, PGlite,
 * PGlite transactions or custom implementations
 */
export interface QueryInterface {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: Record<string, unknown>[] }>
}

/**
 * A connection held for one logical operation.
 */
export interface Session extends QueryInterface {
  /**
   * Run `work` as one commit-or-rollback unit. Any error thrown by `work`
   * rolls the unit back before it is rethrown.
   */
  transaction<T>(work: (tx: QueryInterface) => Promise<T>): Promise<T>
}

export interface Database {
  /** Which engine backs this database, for logging */
  readonly kind: "postgres" | "pglite"

  /**
   * Acquire a session, run `work` with it, and release it on every exit
   * path, success or failure.
   */
  withSession<T>(work: (session: Session) => Promise<T>): Promise<T>

  close(): Promise<void>
}

/**
 * The parts of `pg.Pool` the database uses.
 */
export interface PoolLike {
  connect(): Promise<PoolClientLike>
  end(): Promise<void>
}

export interface PoolClientLike extends QueryInterface {
  /** Passing an error makes the pool discard the client instead of reusing it */
  release(err?: Error | boolean): void
}

/**
 * Database over a PostgreSQL connection pool: one pooled client per session.
 *
 * @example
 * ```typescript
 * import pg from "pg"
 *
 * const pool = new pg.Pool({ connectionString: "postgres://localhost/tasks" })
 * const database = createPoolDatabase(pool)
 * ```
 */
export function createPoolDatabase(pool: PoolLike): Database {
  return {
    kind: "postgres",

    async withSession<T>(work: (session: Session) => Promise<T>) {
      const client = await pool.connect()
      // Set when the connection can no longer be trusted
      let broken: Error | undefined
      try {
        return await work({
          query: (text, values) => client.query(text, values),
          async transaction<U>(unit: (tx: QueryInterface) => Promise<U>) {
            await client.query("BEGIN")
            try {
              const result = await unit(client)
              await client.query("COMMIT")
              return result
            } catch (error) {
              try {
                await client.query("ROLLBACK")
              } catch (rollbackError) {
                broken =
                  rollbackError instanceof Error
                    ? rollbackError
                    : new Error("ROLLBACK failed", { cause: rollbackError })
              }
              throw error
            }
          },
        })
      } finally {
        client.release(broken)
      }
    },

    close: () => pool.end(),
  }
}

/**
 * Database over an embedded PGlite instance.
 *
 * PGlite has a single connection, so sessions are run one at a time: a
 * session never observes another session's open transaction.
 */
export function createPgliteDatabase(db: PGlite): Database {
  let tail: Promise<unknown> = Promise.resolve()

  const session: Session = {
    query: (text, values) => db.query(text, values),
    transaction: <T>(unit: (tx: QueryInterface) => Promise<T>) =>
      db.transaction(tx =>
        unit({ query: (text, values) => tx.query(text, values) }),
      ),
  }

  return {
    kind: "pglite",

    withSession<T>(work: (session: Session) => Promise<T>) {
      const run = tail.then(() => work(session))
      // The queue only orders sessions; failures reach the caller through `run`
      tail = run.catch(() => undefined)
      return run
    },

    close: () => db.close(),
  }
}

export type DatabaseLocation =
  | { type: "postgres"; connectionString: string }
  | { type: "pglite-memory" }
  | { type: "pglite-file"; dataDir: string }

/**
 * Resolve a DATABASE_URL into the engine that serves it.
 *
 * - `postgres://...`, `postgresql://...`: a PostgreSQL server
 * - `memory://`: an in-memory PGlite instance
 * - `file:<dir>` or a bare path: a PGlite data directory on disk
 */
export function parseDatabaseUrl(url: string): DatabaseLocation {
  if (/^postgres(ql)?:\/\//.test(url)) {
    return { type: "postgres", connectionString: url }
  }
  if (url === "memory://" || url === "memory:") {
    return { type: "pglite-memory" }
  }
  const dataDir = url.startsWith("file://")
    ? url.slice("file://".length)
    : url.startsWith("file:")
      ? url.slice("file:".length)
      : url
  if (dataDir === "") {
    throw new Error(`DATABASE_URL has no data directory: ${url}`)
  }
  return { type: "pglite-file", dataDir }
}

export async function openDatabase(url: string): Promise<Database> {
  const location = parseDatabaseUrl(url)

  switch (location.type) {
    case "postgres":
      return createPoolDatabase(
        new pg.Pool({ connectionString: location.connectionString }),
      )
    case "pglite-memory":
      return createPgliteDatabase(await PGlite.create())
    case "pglite-file":
      return createPgliteDatabase(await PGlite.create(location.dataDir))
  }
}

/**
 * Mask the password of a connection string so it can be logged.
 */
export function redactDatabaseUrl(url: string): string {
  return url.replace(/^(postgres(?:ql)?:\/\/[^:/@]+:)[^@]*@/, "$1****@")
}

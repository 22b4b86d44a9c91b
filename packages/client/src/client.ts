import {
  type CreateTaskBody,
  type Task,
  type TaskId,
  TaskSchema,
  type UpdateTaskBody,
} from "@tasklist/tasks"

/**
 * A response outside 2xx that the client does not turn into a return value.
 */
export class TaskApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly body?: unknown,
  ) {
    super(message)
    this.name = "TaskApiError"
  }
}

export interface TaskApiClientOptions {
  /** Origin of the server, e.g. `http://localhost:8000` */
  baseUrl: string

  /**
   * Prefix of the task routes.
   * @default "/api"
   */
  apiPath?: string

  /** Extra headers sent with every request */
  headers?: Record<string, string>

  /** Fetch implementation; defaults to the global `fetch` */
  fetch?: typeof fetch
}

function errorMessage(status: number, body: unknown): string {
  if (
    typeof body === "object" &&
    body !== null &&
    "error" in body &&
    typeof body.error === "string"
  ) {
    return body.error
  }
  return `HTTP ${status}`
}

/**
 * Typed client for the task list HTTP API.
 *
 * Not-found is part of the return type (`undefined` / `false`); any other
 * non-2xx response throws a TaskApiError.
 *
 * @example
 * ```typescript
 * const client = new TaskApiClient({ baseUrl: "http://localhost:8000" })
 * const task = await client.createTask({ title: "Buy milk" })
 * await client.updateTask(task.id, { completed: true })
 * ```
 */
export class TaskApiClient {
  readonly #baseUrl: string
  readonly #headers: Record<string, string>
  readonly #fetch: typeof fetch

  constructor(options: TaskApiClientOptions) {
    const apiPath = options.apiPath ?? "/api"
    this.#baseUrl = `${options.baseUrl.replace(/\/+$/, "")}${apiPath}`
    this.#headers = options.headers ?? {}
    this.#fetch = options.fetch ?? ((input, init) => fetch(input, init))
  }

  async listTasks(): Promise<Task[]> {
    const response = await this.#request("GET", "/tasks")
    return TaskSchema.array().parse(await this.#json(response))
  }

  async getTask(id: TaskId): Promise<Task | undefined> {
    const response = await this.#request("GET", `/tasks/${id}`, undefined, {
      allowNotFound: true,
    })
    if (response.status === 404) return undefined
    return TaskSchema.parse(await this.#json(response))
  }

  async createTask(input: CreateTaskBody): Promise<Task> {
    const response = await this.#request("POST", "/tasks", input)
    return TaskSchema.parse(await this.#json(response))
  }

  async updateTask(
    id: TaskId,
    patch: UpdateTaskBody,
  ): Promise<Task | undefined> {
    const response = await this.#request("PUT", `/tasks/${id}`, patch, {
      allowNotFound: true,
    })
    if (response.status === 404) return undefined
    return TaskSchema.parse(await this.#json(response))
  }

  async deleteTask(id: TaskId): Promise<boolean> {
    const response = await this.#request("DELETE", `/tasks/${id}`, undefined, {
      allowNotFound: true,
    })
    return response.status !== 404
  }

  async #request(
    method: string,
    path: string,
    body?: unknown,
    options: { allowNotFound?: boolean } = {},
  ): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...this.#headers,
    }
    if (body !== undefined) {
      headers["Content-Type"] = "application/json"
    }

    const response = await this.#fetch(`${this.#baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    })

    if (response.ok || (options.allowNotFound && response.status === 404)) {
      return response
    }

    const errorBody = await this.#errorBody(response)
    throw new TaskApiError(
      response.status,
      errorMessage(response.status, errorBody),
      errorBody,
    )
  }

  async #errorBody(response: Response): Promise<unknown> {
    const contentType = response.headers.get("content-type") ?? ""
    return contentType.includes("application/json")
      ? this.#json(response)
      : response.text()
  }

  async #json(response: Response): Promise<unknown> {
    const data: unknown = await response.json()
    return data
  }
}

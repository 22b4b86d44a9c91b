import type { Server } from "node:http"
import { getLogger } from "@logtape/logtape"
import {
  createTaskHandlers,
  InMemoryTaskStore,
  type TaskHandlers,
} from "@tasklist/tasks"
import express from "express"
import { afterEach, describe, expect, it, vi } from "vitest"
import { jsonErrorHandler } from "../error-handler.js"
import { createTaskExpressRouter } from "../express-router.js"
import { requestLogger } from "../request-logger.js"

const logger = getLogger(["tasklist", "test", "express"])

async function startServer(
  handlers: TaskHandlers,
  tasksPath?: string,
): Promise<{ server: Server; baseUrl: string }> {
  const app = express()
  app.use(express.json())
  app.use(requestLogger(logger))
  app.use("/api", createTaskExpressRouter(handlers, { tasksPath }))
  app.use(jsonErrorHandler(logger))

  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening))
  })
  const address = server.address()
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port")
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` }
}

function json(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  }
}

describe("createTaskExpressRouter", () => {
  let server: Server | undefined

  afterEach(async () => {
    if (server) {
      const closing = server
      await new Promise<void>((resolve, reject) =>
        closing.close(error => (error ? reject(error) : resolve())),
      )
      server = undefined
    }
  })

  async function start(handlers: TaskHandlers, tasksPath?: string) {
    const started = await startServer(handlers, tasksPath)
    server = started.server
    return started.baseUrl
  }

  it("should serve the full task lifecycle", async () => {
    const baseUrl = await start(
      createTaskHandlers({ store: new InMemoryTaskStore(), logger }),
    )

    const created = await fetch(
      `${baseUrl}/api/tasks`,
      json("POST", { title: "Buy milk" }),
    )
    expect(created.status).toBe(201)
    expect(await created.json()).toEqual({
      id: 1,
      title: "Buy milk",
      description: null,
      completed: false,
    })

    const listed = await fetch(`${baseUrl}/api/tasks`)
    expect(listed.status).toBe(200)
    expect(await listed.json()).toEqual([
      { id: 1, title: "Buy milk", description: null, completed: false },
    ])

    const updated = await fetch(
      `${baseUrl}/api/tasks/1`,
      json("PUT", { completed: true }),
    )
    expect(updated.status).toBe(200)
    expect(await updated.json()).toEqual({
      id: 1,
      title: "Buy milk",
      description: null,
      completed: true,
    })

    const deleted = await fetch(`${baseUrl}/api/tasks/1`, { method: "DELETE" })
    expect(deleted.status).toBe(204)
    expect(await deleted.text()).toBe("")

    const missing = await fetch(`${baseUrl}/api/tasks/1`)
    expect(missing.status).toBe(404)
    expect(await missing.json()).toEqual({ error: "Task with id 1 not found" })
  })

  it("should answer 422 with issues for an invalid body", async () => {
    const baseUrl = await start(
      createTaskHandlers({ store: new InMemoryTaskStore(), logger }),
    )

    const response = await fetch(`${baseUrl}/api/tasks`, json("POST", {}))

    expect(response.status).toBe(422)
    expect(await response.json()).toEqual({
      error: "Invalid request body",
      issues: [{ path: "title", message: "title is required" }],
    })
  })

  it("should answer 400 for a malformed JSON body", async () => {
    const baseUrl = await start(
      createTaskHandlers({ store: new InMemoryTaskStore(), logger }),
    )

    const response = await fetch(`${baseUrl}/api/tasks`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{ not json",
    })

    expect(response.status).toBe(400)
    expect(await response.json()).toEqual({ error: "Malformed JSON body" })
  })

  it("should answer 413 for a body over the size limit", async () => {
    const warnSpy = vi.spyOn(logger, "warn")
    const errorSpy = vi.spyOn(logger, "error")
    const baseUrl = await start(
      createTaskHandlers({ store: new InMemoryTaskStore(), logger }),
    )

    const response = await fetch(
      `${baseUrl}/api/tasks`,
      json("POST", { title: "Big", description: "x".repeat(200_000) }),
    )

    expect(response.status).toBe(413)
    expect(await response.json()).toEqual({ error: "request entity too large" })
    expect(warnSpy).toHaveBeenCalledWith(
      "Rejected request body on {method} {url}: {error}",
      expect.objectContaining({ method: "POST", url: "/api/tasks", status: 413 }),
    )
    expect(errorSpy).not.toHaveBeenCalled()
    warnSpy.mockRestore()
    errorSpy.mockRestore()
  })

  it("should answer 415 for an unsupported charset", async () => {
    const warnSpy = vi.spyOn(logger, "warn")
    const errorSpy = vi.spyOn(logger, "error")
    const baseUrl = await start(
      createTaskHandlers({ store: new InMemoryTaskStore(), logger }),
    )

    const response = await fetch(`${baseUrl}/api/tasks`, {
      method: "POST",
      headers: { "Content-Type": "application/json; charset=klingon" },
      body: JSON.stringify({ title: "Qapla" }),
    })

    expect(response.status).toBe(415)
    expect(await response.json()).toEqual({
      error: 'unsupported charset "KLINGON"',
    })
    expect(warnSpy).toHaveBeenCalledWith(
      "Rejected request body on {method} {url}: {error}",
      expect.objectContaining({ method: "POST", url: "/api/tasks", status: 415 }),
    )
    expect(errorSpy).not.toHaveBeenCalled()
    warnSpy.mockRestore()
    errorSpy.mockRestore()
  })

  it("should hand handler exceptions to the error middleware", async () => {
    const handlers: TaskHandlers = {
      listTasks: vi.fn(async () => {
        throw new Error("unexpected")
      }),
      getTask: vi.fn(),
      createTask: vi.fn(),
      updateTask: vi.fn(),
      deleteTask: vi.fn(),
    }
    const errorSpy = vi.spyOn(logger, "error")
    const baseUrl = await start(handlers)

    const response = await fetch(`${baseUrl}/api/tasks`)

    expect(response.status).toBe(500)
    expect(await response.json()).toEqual({ error: "Internal server error" })
    expect(errorSpy).toHaveBeenCalledWith(
      "Unhandled error on {method} {url}: {error}",
      expect.objectContaining({ method: "GET", url: "/api/tasks" }),
    )
    errorSpy.mockRestore()
  })

  it("should mount the routes on a custom collection path", async () => {
    const baseUrl = await start(
      createTaskHandlers({ store: new InMemoryTaskStore(), logger }),
      "/todos",
    )

    const response = await fetch(`${baseUrl}/api/todos`)

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual([])
  })

  it("should log each request once it finishes", async () => {
    const infoSpy = vi.spyOn(logger, "info")
    const baseUrl = await start(
      createTaskHandlers({ store: new InMemoryTaskStore() }),
    )

    const response = await fetch(`${baseUrl}/api/tasks/5`)
    await response.json()

    await vi.waitFor(() =>
      expect(infoSpy).toHaveBeenCalledWith(
        "{method} {url} {status} {durationMs}ms",
        expect.objectContaining({
          method: "GET",
          url: "/api/tasks/5",
          status: 404,
        }),
      ),
    )
    infoSpy.mockRestore()
  })
})

import { describe, expect, it } from "vitest"
import { ConfigError, DEFAULT_DATABASE_URL, loadConfig } from "./config.js"

describe("loadConfig", () => {
  it("should fall back to defaults", () => {
    expect(loadConfig({})).toEqual({
      databaseUrl: DEFAULT_DATABASE_URL,
      port: 8000,
      host: "0.0.0.0",
      logLevel: "info",
      corsOrigin: "*",
    })
  })

  it("should read every variable", () => {
    expect(
      loadConfig({
        DATABASE_URL: "postgres://app:test-secret@db:5432/tasks",
        PORT: "3000",
        HOST: "127.0.0.1",
        LOG_LEVEL: "debug",
        CORS_ORIGIN: "http://localhost:3000",
      }),
    ).toEqual({
      databaseUrl: "postgres://app:test-secret@db:5432/tasks",
      port: 3000,
      host: "127.0.0.1",
      logLevel: "debug",
      corsOrigin: "http://localhost:3000",
    })
  })

  it("should treat empty strings as unset", () => {
    expect(loadConfig({ DATABASE_URL: "", PORT: "" }).databaseUrl).toBe(
      DEFAULT_DATABASE_URL,
    )
  })

  it("should reject an invalid port and log level", () => {
    expect(() => loadConfig({ PORT: "http", LOG_LEVEL: "loud" })).toThrow(
      ConfigError,
    )
  })

  it("should name the offending variables", () => {
    try {
      loadConfig({ PORT: "70000" })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError)
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(1)
        expect(error.issues[0]).toMatch(/^PORT: /)
      }
    }
  })
})

import { z } from "zod"

export const DEFAULT_DATABASE_URL = "file:./data/tasks"

const LogLevelSchema = z.enum([
  "trace",
  "debug",
  "info",
  "warning",
  "error",
  "fatal",
])

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).default(DEFAULT_DATABASE_URL),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: LogLevelSchema.default("info"),
  CORS_ORIGIN: z.string().min(1).default("*"),
})

export interface ServerConfig {
  databaseUrl: string
  port: number
  host: string
  logLevel: z.infer<typeof LogLevelSchema>
  corsOrigin: string
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`)
    this.name = "ConfigError"
  }
}

/**
 * Read the server configuration from environment variables. Empty strings
 * count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  )
  const parsed = EnvSchema.safeParse(present)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`),
    )
  }

  return {
    databaseUrl: parsed.data.DATABASE_URL,
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    logLevel: parsed.data.LOG_LEVEL,
    corsOrigin: parsed.data.CORS_ORIGIN,
  }
}

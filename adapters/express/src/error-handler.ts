import type { Logger } from "@logtape/logtape"
import type { ErrorRequestHandler } from "express"

/**
 * body-parser marks a body it could not parse with this type.
 */
function isBodyParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    "type" in error &&
    error.type === "entity.parse.failed"
  )
}

/**
 * A 4xx http-errors error whose message is safe to show the client, as raised
 * by body-parser for an oversized body, an unsupported charset or encoding.
 */
function isExposedClientError(
  error: unknown,
): error is Error & { status: number } {
  return (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500 &&
    "expose" in error &&
    error.expose === true
  )
}

/**
 * Last middleware of the app: answers malformed JSON with 400, other client
 * errors of the body parser with their own 4xx status, and anything else with
 * a generic 500 that never exposes the error itself.
 */
export const jsonErrorHandler =
  (logger: Logger): ErrorRequestHandler =>
  (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error)
      return
    }

    if (isBodyParseError(error)) {
      logger.warn("Malformed JSON body on {method} {url}", {
        method: req.method,
        url: req.originalUrl,
      })
      res.status(400).json({ error: "Malformed JSON body" })
      return
    }

    if (isExposedClientError(error)) {
      logger.warn("Rejected request body on {method} {url}: {error}", {
        method: req.method,
        url: req.originalUrl,
        status: error.status,
        error: error.message,
      })
      res.status(error.status).json({ error: error.message })
      return
    }

    logger.error("Unhandled error on {method} {url}: {error}", {
      method: req.method,
      url: req.originalUrl,
      error,
    })
    res.status(500).json({ error: "Internal server error" })
  }

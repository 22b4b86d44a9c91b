import type { Logger } from "@logtape/logtape"
import type { RequestHandler } from "express"

/**
 * Log method, url, status and duration of each request once its response
 * has been sent.
 */
export const requestLogger =
  (logger: Logger): RequestHandler =>
  (req, res, next) => {
    const startedAt = performance.now()
    res.on("finish", () => {
      logger.info("{method} {url} {status} {durationMs}ms", {
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        durationMs: Math.round(performance.now() - startedAt),
      })
    })
    next()
  }

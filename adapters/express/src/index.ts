export { jsonErrorHandler } from "./error-handler.js"
export type { TaskExpressRouterOptions } from "./express-router.js"
export { createTaskExpressRouter } from "./express-router.js"
export { requestLogger } from "./request-logger.js"

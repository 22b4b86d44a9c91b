export * from "./errors.js"
export * from "./in-memory-task-store.js"
export * from "./task-handler.js"
export * from "./task-store.js"
export * from "./task-update.js"
export * from "./types.js"

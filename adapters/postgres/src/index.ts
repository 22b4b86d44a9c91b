export * from "./database.js"
export * from "./postgres-task-store.js"

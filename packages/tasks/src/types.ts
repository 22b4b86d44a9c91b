import { z } from "zod"

export const TITLE_MAX_LENGTH = 255

/** Largest id a Postgres SERIAL column can hold. */
export const TASK_ID_MAX = 2147483647

export const TaskSchema = z.object({
  id: z.number().int().positive(),
  title: z.string().min(1),
  description: z.string().nullable(),
  completed: z.boolean(),
})

export type Task = z.infer<typeof TaskSchema>

export type TaskId = Task["id"]

const TitleSchema = z
  .string({ required_error: "title is required" })
  .trim()
  .min(1, "title must not be empty")
  .max(TITLE_MAX_LENGTH, `title must be at most ${TITLE_MAX_LENGTH} characters`)

export const CreateTaskBodySchema = z.object({
  title: TitleSchema,
  description: z.string().nullable().optional(),
  completed: z.boolean().optional(),
})

export type CreateTaskBody = z.infer<typeof CreateTaskBodySchema>

/**
 * Body of a merge-patch update. A key that is absent leaves the field as it
 * is; `description` alone accepts an explicit `null`, which clears it.
 */
export const UpdateTaskBodySchema = z.object({
  title: TitleSchema.optional(),
  description: z.string().nullable().optional(),
  completed: z.boolean().optional(),
})

export type UpdateTaskBody = z.infer<typeof UpdateTaskBodySchema>

export const TaskIdSchema = z
  .string()
  .regex(/^[0-9]+$/, "task id must be a positive integer")
  .transform(value => Number(value))
  .pipe(
    z
      .number()
      .int()
      .min(1, "task id must be a positive integer")
      .max(TASK_ID_MAX, `task id must be at most ${TASK_ID_MAX}`),
  )

/** A task as handed to storage for insertion, before it has an id. */
export interface NewTask {
  title: string
  description: string | null
  completed: boolean
}

export function toNewTask(body: CreateTaskBody): NewTask {
  return {
    title: body.title,
    description: body.description ?? null,
    completed: body.completed ?? false,
  }
}

export interface ValidationIssue {
  path: string
  message: string
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join("."),
    message: issue.message,
  }))
}

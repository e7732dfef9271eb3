import { Err, Ok, type Result } from "slang-ts";
import z from "zod";
import { type Task, type TaskStore, taskTextSchema } from "@/store";
import type {
  DeleteTaskResponse,
  HealthResponse,
  RootResponse,
  TaskResponse,
  ValidationErrorDetail,
} from "./types";

// --- Zod schemas for incoming requests ---

export const createTaskBodySchema = z.object({
  text: taskTextSchema,
});

const INTEGER_PATTERN = /^-?\d+$/;

/** Any base-10 integer, parsed as a bigint so huge ids stay exact */
export const taskIdParamSchema = z
  .string()
  .regex(INTEGER_PATTERN, "Task id must be an integer")
  .transform((raw) => BigInt(raw));

const MIN_SAFE_ID = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE_ID = BigInt(Number.MAX_SAFE_INTEGER);

// --- Response mapping ---

export const toTaskResponse = (task: Task): TaskResponse => ({
  id: task.id,
  text: task.text,
});

/**
 * Maps zod issues to `{ type, loc, msg }` validation details.
 * `location` is the first `loc` segment: "body" or "path".
 */
export function toValidationDetails(
  issues: z.ZodIssue[],
  location: "body" | "path",
  basePath: Array<string | number> = []
): ValidationErrorDetail[] {
  return issues.map((issue) => ({
    type: issue.code,
    loc: [location, ...basePath, ...issue.path],
    msg: issue.message,
  }));
}

/** Failure of a request handler, carrying the HTTP status it maps to */
export type HandlerFailure =
  | { status: 404; detail: string }
  | { status: 422; detail: ValidationErrorDetail[] };

const notFound = (detail: string): HandlerFailure => ({ status: 404, detail });

const unprocessable = (detail: ValidationErrorDetail[]): HandlerFailure => ({
  status: 422,
  detail,
});

// --- Handlers ---

export const ENDPOINT_DESCRIPTIONS: Record<string, string> = {
  "GET /tasks": "Get all tasks",
  "POST /tasks": "Create a new task",
  "DELETE /tasks/{id}": "Delete a task by ID",
};

export function handleRoot(
  store: TaskStore,
  serverName: string,
  version: string
): RootResponse {
  return {
    message: serverName,
    version,
    endpoints: ENDPOINT_DESCRIPTIONS,
    total_tasks: store.stats().tasksCount,
  };
}

export function handleListTasks(store: TaskStore): TaskResponse[] {
  return store.list().map(toTaskResponse);
}

/**
 * Validates a POST /tasks body and creates the task.
 * `body` is null when the request had no parseable JSON.
 */
export function handleCreateTask(
  store: TaskStore,
  body: unknown
): Result<TaskResponse, HandlerFailure> {
  if (body === null) {
    return Err(
      unprocessable([
        {
          type: "json_invalid",
          loc: ["body"],
          msg: "Invalid or missing JSON body",
        },
      ])
    );
  }

  const parsed = createTaskBodySchema.safeParse(body);
  if (!parsed.success) {
    return Err(unprocessable(toValidationDetails(parsed.error.issues, "body")));
  }

  const created = store.create(parsed.data.text);
  if (created.isErr) {
    return Err(
      unprocessable(toValidationDetails(created.error.issues, "body", ["text"]))
    );
  }

  return Ok(toTaskResponse(created.value));
}

export function handleDeleteTask(
  store: TaskStore,
  rawId: string
): Result<DeleteTaskResponse, HandlerFailure> {
  const parsedId = taskIdParamSchema.safeParse(rawId);
  if (!parsedId.success) {
    return Err(
      unprocessable(toValidationDetails(parsedId.error.issues, "path", ["id"]))
    );
  }

  // No id the store can issue lies outside the safe range
  const id = parsedId.data;
  if (id < MIN_SAFE_ID || id > MAX_SAFE_ID) {
    return Err(notFound(`Task with id ${id} not found`));
  }

  const deleted = store.delete(Number(id));
  if (deleted.isErr) {
    return Err(notFound(deleted.error.message));
  }

  return Ok({
    message: `Task with id ${id} deleted successfully`,
    deleted_task: toTaskResponse(deleted.value),
  });
}

export function handleHealth(store: TaskStore): HealthResponse {
  const { tasksCount, nextId } = store.stats();
  return { status: "healthy", tasks_count: tasksCount, next_id: nextId };
}

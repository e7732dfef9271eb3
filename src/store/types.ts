import type { Result } from "slang-ts";
import z from "zod";

export const TASK_TEXT_MAX_LENGTH = 200;

/** Task text rule shared by the REST boundary and the store itself */
export const taskTextSchema = z
  .string({
    required_error: "Task text is required",
    invalid_type_error: "Task text must be a string",
  })
  .trim()
  .min(1, "Task text must not be empty")
  // Counted in code points: an emoji is one character, not two UTF-16 units
  .superRefine((text, ctx) => {
    if ([...text].length > TASK_TEXT_MAX_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_big,
        maximum: TASK_TEXT_MAX_LENGTH,
        type: "string",
        inclusive: true,
        message: `Task text must be at most ${TASK_TEXT_MAX_LENGTH} characters`,
      });
    }
  });

export interface Task {
  readonly id: number;
  readonly text: string;
}

export interface TaskNotFound {
  kind: "not_found";
  id: number;
  message: string;
}

export interface InvalidTaskText {
  kind: "invalid_text";
  message: string;
  issues: z.ZodIssue[];
}

export type TaskStoreError = TaskNotFound | InvalidTaskText;

export interface TaskStoreStats {
  tasksCount: number;
  nextId: number;
}

/**
 * In-memory task collection with a monotonically increasing id counter.
 *
 * Every method is synchronous, so on Node's single event-loop thread no two
 * calls ever interleave.
 */
export interface TaskStore {
  /** Snapshot of all tasks in insertion order */
  list: () => Task[];
  create: (text: string) => Result<Task, InvalidTaskText>;
  delete: (id: number) => Result<Task, TaskNotFound>;
  stats: () => TaskStoreStats;
}

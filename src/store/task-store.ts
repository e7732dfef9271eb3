import { Err, Ok } from "slang-ts";
import type { InvalidTaskText, Task, TaskNotFound, TaskStore } from "./types";
import { taskTextSchema } from "./types";

/**
 * Creates an empty task store. Ids start at 1 and are never reused,
 * even after the task that held them is deleted.
 */
export function createTaskStore(): TaskStore {
  const tasks: Task[] = [];
  let nextId = 1;

  return {
    list: () => [...tasks],

    create: (text) => {
      const parsed = taskTextSchema.safeParse(text);
      if (!parsed.success) {
        const invalid: InvalidTaskText = {
          kind: "invalid_text",
          message: parsed.error.issues[0]?.message ?? "Invalid task text",
          issues: parsed.error.issues,
        };
        return Err(invalid);
      }

      const task: Task = Object.freeze({ id: nextId, text: parsed.data });
      tasks.push(task);
      nextId += 1;
      return Ok(task);
    },

    delete: (id) => {
      const index = tasks.findIndex((task) => task.id === id);
      const task = tasks[index];
      if (!task) {
        const notFound: TaskNotFound = {
          kind: "not_found",
          id,
          message: `Task with id ${id} not found`,
        };
        return Err(notFound);
      }

      tasks.splice(index, 1);
      return Ok(task);
    },

    stats: () => ({ tasksCount: tasks.length, nextId }),
  };
}

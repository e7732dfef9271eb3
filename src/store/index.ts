// biome-ignore lint/performance/noBarrelFile: Public API entry point for the task store
export { createTaskStore } from "./task-store";
export {
  type InvalidTaskText,
  TASK_TEXT_MAX_LENGTH,
  type Task,
  type TaskNotFound,
  type TaskStore,
  type TaskStoreError,
  type TaskStoreStats,
  taskTextSchema,
} from "./types";

// Configuration — environment parsing
export { type AppConfig, loadConfig } from "./config/config";
// CORS types — origin control, per-route rules, and resolver functions
export type {
  CorsConfig,
  CorsOptions,
  CorsResolver,
  CorsRouteRule,
} from "./cors/types";
// Logging — structured pino records with optional file chunking
export {
  type AppLogger,
  createLogger,
  formatChunkName,
  type Log,
  type LogChunking,
  type LoggerConfig,
  type LogLevel,
  type LogMode,
  resolveLogPath,
} from "./logging";
// REST — Hono app factory and response shapes
export { createRestApp } from "./rest/rest";
export type {
  DeleteTaskResponse,
  ErrorResponse,
  HealthResponse,
  RateLimitConfig,
  RestConfig,
  RootResponse,
  TaskResponse,
  ValidationErrorDetail,
  ValidationErrorResponse,
} from "./rest/types";
// Server factory — the main entry point for embedding the service
export {
  createTodoServer,
  DEFAULT_SERVER_NAME,
  DEFAULT_VERSION,
  type ServerConfig,
  type TodoServer,
} from "./server";
// Task store — the in-memory collection and its id counter
export {
  createTaskStore,
  type InvalidTaskText,
  TASK_TEXT_MAX_LENGTH,
  type Task,
  type TaskNotFound,
  type TaskStore,
  type TaskStoreError,
  type TaskStoreStats,
  taskTextSchema,
} from "./store";
// Utilities — error handling and diagnostics
export { createDiagnosticsLog, type HandleErrorParams, handleError } from "./utils";

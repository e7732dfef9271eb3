import type { Store } from "hono-rate-limiter";
import type { CorsConfig } from "@/cors/types";

export interface RateLimitConfig {
  windowMs?: number;
  limit?: number;
  standardHeaders?: boolean;
  limitingHeader: string;
  store?: Store;
}

/** Request handling options; the listen address belongs to the entry point */
export interface RestConfig {
  diagnostics?: boolean;
  enableStatic?: boolean;
  /** Directory served at /static/*. Default: ./static */
  staticDir?: string;
  rateLimiting?: RateLimitConfig;
  allowedOrigins: string[];
  cors?: CorsConfig;
}

// --- Response bodies ---

export interface TaskResponse {
  id: number;
  text: string;
}

export interface RootResponse {
  message: string;
  version: string;
  endpoints: Record<string, string>;
  total_tasks: number;
}

export interface DeleteTaskResponse {
  message: string;
  deleted_task: TaskResponse;
}

export interface HealthResponse {
  status: "healthy";
  tasks_count: number;
  next_id: number;
}

/** One entry of a 422 response; `loc` is the path to the offending input */
export interface ValidationErrorDetail {
  type: string;
  loc: Array<string | number>;
  msg: string;
}

export interface ValidationErrorResponse {
  detail: ValidationErrorDetail[];
}

export interface ErrorResponse {
  detail: string;
}

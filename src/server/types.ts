import type { Hono } from "hono";
import type { AppLogger } from "@/logging";
import type { RestConfig } from "@/rest/types";
import type { TaskStore } from "@/store";

export interface ServerConfig {
  /** Reported by GET / as `message`. Default: "Session To-Do List API" */
  serverName?: string;
  /** Reported by GET / as `version`. Default: "1.0.0" */
  version?: string;
  diagnostics?: boolean;
  /** Structured logger; defaults to a dev-mode logger named after the server */
  logger?: AppLogger;
  /** Injected store, e.g. one shared with other components; a fresh store by default */
  store?: TaskStore;
  rest: RestConfig;
}

export interface TodoServer {
  config: ServerConfig;
  store: TaskStore;
  logger: AppLogger;
  app: Hono;
}

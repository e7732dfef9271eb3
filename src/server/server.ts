import { createLogger } from "@/logging";
import { createRestApp } from "@/rest/rest";
import { createTaskStore } from "@/store";
import { createDiagnosticsLog } from "@/utils";
import type { ServerConfig, TodoServer } from "./types";

export const DEFAULT_SERVER_NAME = "Session To-Do List API";
export const DEFAULT_VERSION = "1.0.0";

/**
 * Bootstraps a task list server instance.
 *
 * Owns exactly one TaskStore for its lifetime and injects it into the REST
 * layer, so separate servers (and separate tests) never share tasks.
 *
 * @param config - Server configuration including rest options, logger and an optional store
 * @returns The server with its store, logger and Hono app
 */
export function createTodoServer(config: ServerConfig): TodoServer {
  const serverName = config.serverName ?? DEFAULT_SERVER_NAME;
  const version = config.version ?? DEFAULT_VERSION;
  const logger = config.logger ?? createLogger("todo-server");
  const store = config.store ?? createTaskStore();

  const log = createDiagnosticsLog("TodoServer", {
    diagnostics: config.diagnostics,
    logger,
  });

  const app = createRestApp({
    config: {
      ...config.rest,
      diagnostics: config.rest.diagnostics ?? config.diagnostics,
    },
    store,
    serverName,
    version,
    logger,
  });

  log(`${serverName} v${version} ready`, store.stats());

  return { config, store, logger, app };
}

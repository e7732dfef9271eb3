import { Hono } from "hono";
import { applyCorsConfig } from "@/cors/cors";
import type { AppLogger } from "@/logging";
import type { TaskStore } from "@/store";
import { createDiagnosticsLog, handleError } from "@/utils";
import {
  applyRateLimiting,
  applyRequestDiagnostics,
  applyStaticServing,
} from "./middleware";
import {
  handleCreateTask,
  handleDeleteTask,
  handleHealth,
  handleListTasks,
  handleRoot,
} from "./task-handlers";
import type { ErrorResponse, RestConfig } from "./types";

// --- Factory ---

interface CreateRestAppParams {
  config: RestConfig;
  store: TaskStore;
  serverName: string;
  version: string;
  logger: AppLogger;
}

/**
 * Creates the Hono REST app for the task list.
 *
 * Every route is a thin translation onto the injected TaskStore: request
 * validation happens here, store results are mapped to status codes and
 * JSON bodies (`detail` on errors).
 */
export function createRestApp(params: CreateRestAppParams): Hono {
  const { config, store, serverName, version, logger } = params;
  const app = new Hono();

  const log = createDiagnosticsLog("REST", {
    diagnostics: config.diagnostics,
    logger,
  });

  applyRequestDiagnostics(app, config, log);

  // Apply CORS
  applyCorsConfig(app, config);

  // Apply rate limiting when a limiting header is configured
  applyRateLimiting(app, config, log);

  applyStaticServing(app, config, log);

  app.get("/", (c) => c.json(handleRoot(store, serverName, version)));

  app.get("/tasks", (c) => c.json(handleListTasks(store)));

  app.post("/tasks", async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const result = handleCreateTask(store, body);

    if (result.isErr) {
      return c.json({ detail: result.error.detail }, result.error.status);
    }

    log(`Created task ${result.value.id}`);
    return c.json(result.value, 201);
  });

  app.delete("/tasks/:id", (c) => {
    const result = handleDeleteTask(store, c.req.param("id"));

    if (result.isErr) {
      return c.json({ detail: result.error.detail }, result.error.status);
    }

    log(`Deleted task ${result.value.deleted_task.id}`);
    return c.json(result.value, 200);
  });

  app.get("/health", (c) => c.json(handleHealth(store)));

  app.notFound((c) =>
    c.json({ detail: "Not Found" } satisfies ErrorResponse, 404)
  );

  // Internal details stay in the log; the client gets the log ID to quote
  app.onError((error, c) => {
    const result = handleError({
      message: `Unhandled error on ${c.req.method} ${c.req.path}`,
      data: { error: error.message, stack: error.stack },
      logger,
      atFunction: "createRestApp",
    });
    const detail = result.isErr ? result.error : "Internal Server Error";
    return c.json({ detail } satisfies ErrorResponse, 500);
  });

  log("REST interface ready");

  return app;
}

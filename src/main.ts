import "dotenv/config";
import { serve } from "@hono/node-server";
import { loadConfig } from "@/config/config";
import { createLogger } from "@/logging";
import { createTodoServer } from "@/server";

const APP_NAME = "todo-server";

const configResult = loadConfig(process.env);
if (configResult.isErr) {
  console.error(`[${APP_NAME}] ${configResult.error}`);
  process.exit(1);
}
const config = configResult.value;

const logger = createLogger(APP_NAME, {
  mode: config.mode,
  chunking: config.logChunking,
  logDir: config.logDir,
});

const server = createTodoServer({
  diagnostics: config.diagnostics,
  logger,
  rest: {
    allowedOrigins: config.allowedOrigins,
    enableStatic: config.enableStatic,
    staticDir: config.staticDir,
    rateLimiting: config.rateLimit
      ? {
          limitingHeader: config.rateLimit.header,
          limit: config.rateLimit.max,
          windowMs: config.rateLimit.windowMs,
        }
      : undefined,
  },
});

const httpServer = serve(
  { fetch: server.app.fetch, hostname: config.host, port: config.port },
  (info) => {
    const base = `http://${config.host}:${info.port}`;
    logger.info({
      atFunction: "main",
      message: "Task list server listening",
      data: { url: base, mode: config.mode },
    });

    console.log(`\n  Task list API on ${base}`);
    console.log("  In-memory storage: tasks are cleared on restart\n");
    console.log(`  GET    ${base}/`);
    console.log(`  GET    ${base}/tasks`);
    console.log(`  POST   ${base}/tasks`);
    console.log(`  DELETE ${base}/tasks/{id}`);
    console.log(`  GET    ${base}/health`);
    if (config.enableStatic) {
      console.log(`  GET    ${base}/static/*`);
    }
    console.log("");
  }
);

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({
    atFunction: "shutdown",
    message: `Received ${signal}, closing server`,
    data: server.store.stats(),
  });
  httpServer.close((error) => {
    if (error) {
      logger.error({
        atFunction: "shutdown",
        message: "Server did not close cleanly",
        data: { error: error.message },
      });
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

import { serveStatic } from "@hono/node-server/serve-static";
import type { Hono } from "hono";
import { rateLimiter } from "hono-rate-limiter";
import type { RestConfig } from "./types";

const STATIC_PREFIX_REGEX = /^\/static/;
const DEFAULT_STATIC_DIR = "./static";
const DEFAULT_RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000; // 15 minutes
const DEFAULT_RATE_LIMIT_MAX = 100;
const UNKNOWN_CLIENT_KEY = "__unknown_client__";

type DiagnosticsLog = (msg: string, data?: unknown) => void;

/**
 * Applies rate limiting middleware when a limiting header is configured.
 * Extracts the client key from the configured request header for per-client tracking.
 * Requests without the header share one fallback key.
 */
export function applyRateLimiting(
  app: Hono,
  config: RestConfig,
  log: DiagnosticsLog
): void {
  if (!config.rateLimiting?.limitingHeader) {
    return;
  }

  const { rateLimiting } = config;
  const windowMs = rateLimiting.windowMs ?? DEFAULT_RATE_LIMIT_WINDOW_MS;
  const limit = rateLimiting.limit ?? DEFAULT_RATE_LIMIT_MAX;

  app.use(
    rateLimiter({
      windowMs,
      limit,
      standardHeaders: rateLimiting.standardHeaders ?? true,
      keyGenerator: (c) => {
        const key = c.req.header(rateLimiting.limitingHeader);
        if (!key) {
          log(
            `Rate limiting header '${rateLimiting.limitingHeader}' missing from request`
          );
          return UNKNOWN_CLIENT_KEY;
        }
        return key;
      },
      store: rateLimiting.store,
    })
  );

  log(`Rate limiting enabled: ${limit} requests per ${windowMs}ms window`);
}

/**
 * Serves files from config.staticDir at /static/*, with index.html for
 * directory paths. Missing files fall through to the next handler.
 */
export function applyStaticServing(
  app: Hono,
  config: RestConfig,
  log: DiagnosticsLog
): void {
  if (!config.enableStatic) {
    return;
  }

  const root = config.staticDir ?? DEFAULT_STATIC_DIR;

  app.use(
    "/static/*",
    serveStatic({
      root,
      rewriteRequestPath: (path) => path.replace(STATIC_PREFIX_REGEX, ""),
    })
  );

  log(`Static file serving enabled at /static/* (root: ${root})`);
}

/** Logs `METHOD path -> status` for every request when diagnostics are on */
export function applyRequestDiagnostics(
  app: Hono,
  config: RestConfig,
  log: DiagnosticsLog
): void {
  if (!config.diagnostics) {
    return;
  }

  app.use("*", async (c, next) => {
    const startedAt = Date.now();
    await next();
    log(`${c.req.method} ${c.req.path} -> ${c.res.status}`, {
      ms: Date.now() - startedAt,
    });
  });
}

import type { Context, Hono } from "hono";
import { cors } from "hono/cors";
import type { RestConfig } from "@/rest/types";
import type { CorsResolver, CorsRouteRule, HonoCorsOptions } from "./types";

const ANY_ORIGIN = "*";

/**
 * Build default CORS options from REST config.
 * An empty allowedOrigins list, or one containing "*", admits every origin;
 * the request origin is echoed back so credentialed requests still work.
 */
export const buildDefaultCorsOptions = (
  config: RestConfig
): HonoCorsOptions => {
  const allowsAny =
    config.allowedOrigins.length === 0 ||
    config.allowedOrigins.includes(ANY_ORIGIN);

  const getDefaultOrigin = (reqOrigin: string) => {
    if (allowsAny) {
      return reqOrigin || ANY_ORIGIN;
    }
    return config.allowedOrigins.includes(reqOrigin) ? reqOrigin : "";
  };

  return {
    origin: config.cors?.defaults?.origin ?? getDefaultOrigin,
    credentials: config.cors?.defaults?.credentials ?? true,
    allowHeaders: config.cors?.defaults?.allowHeaders ?? [
      "Content-Type",
      "Authorization",
    ],
    allowMethods: config.cors?.defaults?.allowMethods ?? [
      "GET",
      "POST",
      "DELETE",
      "OPTIONS",
    ],
    exposeHeaders: config.cors?.defaults?.exposeHeaders ?? ["Content-Length"],
    maxAge: config.cors?.defaults?.maxAge ?? 600,
  };
};

/** Exact match, or prefix match for patterns ending in "/*" */
export const matchesCorsPath = (pattern: string, path: string): boolean => {
  if (pattern === "*") {
    return true;
  }
  if (pattern.endsWith("/*")) {
    const prefix = pattern.slice(0, -2);
    return path === prefix || path.startsWith(`${prefix}/`);
  }
  return pattern === path;
};

/**
 * Apply CORS configuration to a Hono app based on RestConfig.
 * Route rules are checked in order; requests matching none use the defaults.
 */
export const applyCorsConfig = (app: Hono, config: RestConfig): void => {
  const corsEnabled = config.cors?.enabled ?? "default";

  if (corsEnabled === false) {
    return;
  }

  const defaultCorsOpts = buildDefaultCorsOptions(config);
  const defaultCors = cors(defaultCorsOpts);
  const corsRules = config.cors?.addCors ?? [];

  app.use("*", (c, next) => {
    const rule = corsRules.find((r) => matchesCorsPath(r.path, c.req.path));
    if (!rule) {
      return defaultCors(c, next);
    }
    return cors(resolveRuleOptions(rule, c, defaultCorsOpts))(c, next);
  });
};

/**
 * Options for a request matched by a route rule: the resolver's verdict when
 * the rule has one, else the rule's static options over the defaults.
 */
const resolveRuleOptions = (
  rule: CorsRouteRule,
  c: Context,
  defaultOpts: HonoCorsOptions
): HonoCorsOptions => {
  if (rule.resolver) {
    const reqOrigin = c.req.header("origin") ?? "";
    return evaluateResolver(rule.resolver, reqOrigin, c, defaultOpts);
  }
  if (rule.options) {
    return { ...defaultOpts, ...rule.options };
  }
  return defaultOpts;
};

/**
 * Evaluate CORS resolver and return appropriate options
 */
const evaluateResolver = (
  resolver: CorsResolver,
  origin: string,
  c: Context,
  defaultOpts: HonoCorsOptions
): HonoCorsOptions => {
  try {
    const result = resolver(origin, c);

    if (result === true) {
      return { ...defaultOpts, origin: origin || ANY_ORIGIN };
    }

    if (result === false) {
      return { ...defaultOpts, origin: "" };
    }

    if (result && typeof result === "object") {
      return { ...defaultOpts, ...result };
    }

    return defaultOpts;
  } catch (error) {
    // Deny on resolver failure, never fall through to allow
    console.error("CORS resolver error:", error);
    return { ...defaultOpts, origin: "" };
  }
};

import type { Context } from "hono";
import type { cors } from "hono/cors";

/** Options accepted by Hono's cors middleware */
export type HonoCorsOptions = NonNullable<Parameters<typeof cors>[0]>;

/**
 * Partial CORS options, merged over the defaults.
 * `origin` may be a string, a list of strings, or a function of the request origin.
 */
export type CorsOptions = Partial<HonoCorsOptions>;

/**
 * CORS resolver function that determines CORS behavior per request
 * - Return `true` to allow the origin with default options
 * - Return `false` to reject the request
 * - Return a CorsOptions object to override options for this request
 * - Return `undefined` to use the defaults unchanged
 */
export type CorsResolver = (
  origin: string,
  c: Context
) => boolean | CorsOptions | undefined;

/**
 * Per-route CORS configuration. The first rule whose path matches a request
 * replaces the global defaults for that request.
 */
export interface CorsRouteRule {
  /**
   * Path to match: exact (e.g. '/health') or a prefix ending in '/*' (e.g. '/static/*')
   */
  path: string;

  /**
   * Static CORS options for this route
   */
  options?: CorsOptions;

  /**
   * Dynamic resolver function to determine CORS behavior per request
   */
  resolver?: CorsResolver;
}

/**
 * Main CORS configuration for the REST server
 */
export interface CorsConfig {
  /**
   * Enable or disable CORS
   * - `true` or `'default'`: Use default CORS configuration
   * - `false`: Disable CORS middleware entirely (no CORS headers are set)
   */
  enabled?: boolean | "default";

  /**
   * Default CORS options applied globally
   */
  defaults?: CorsOptions;

  /**
   * Additional route-specific CORS rules
   */
  addCors?: CorsRouteRule[];
}

import { Err, Ok, type Result } from "slang-ts";
import z from "zod";
import type { LogChunking, LogMode } from "@/logging";

const BOOLEAN_STRINGS: Record<string, boolean> = {
  true: true,
  "1": true,
  yes: true,
  false: false,
  "0": false,
  no: false,
};

const envBoolean = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return fallback;
      }
      const parsed = BOOLEAN_STRINGS[value.trim().toLowerCase()];
      if (parsed === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected true/false, received '${value}'`,
        });
        return z.NEVER;
      }
      return parsed;
    });

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? "*")
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

// --- Environment schema ---

const envSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
  MODE: z.enum(["dev", "prod", "silent"]).default("dev"),
  LOG_CHUNKING: z.enum(["none", "daily", "weekly", "monthly"]).default("none"),
  LOG_DIR: z.string().min(1).optional(),
  ALLOWED_ORIGINS: commaList,
  ENABLE_STATIC: envBoolean(true),
  STATIC_DIR: z.string().min(1).default("./static"),
  DIAGNOSTICS: envBoolean(false),
  RATE_LIMIT_HEADER: z.string().min(1).optional(),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(900_000),
});

export interface AppConfig {
  host: string;
  port: number;
  mode: LogMode;
  logChunking: LogChunking;
  logDir?: string;
  allowedOrigins: string[];
  enableStatic: boolean;
  staticDir: string;
  diagnostics: boolean;
  rateLimit?: {
    header: string;
    max: number;
    windowMs: number;
  };
}

/**
 * Reads the service configuration from environment variables.
 * Unset variables take their defaults; empty strings count as unset.
 *
 * @returns Ok with the parsed config, or Err listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined>
): Result<AppConfig, string> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    return Err(`Invalid configuration: ${problems.join("; ")}`);
  }

  const vars = parsed.data;
  return Ok({
    host: vars.HOST,
    port: vars.PORT,
    mode: vars.MODE,
    logChunking: vars.LOG_CHUNKING,
    logDir: vars.LOG_DIR,
    allowedOrigins: vars.ALLOWED_ORIGINS,
    enableStatic: vars.ENABLE_STATIC,
    staticDir: vars.STATIC_DIR,
    diagnostics: vars.DIAGNOSTICS,
    rateLimit: vars.RATE_LIMIT_HEADER
      ? {
          header: vars.RATE_LIMIT_HEADER,
          max: vars.RATE_LIMIT_MAX,
          windowMs: vars.RATE_LIMIT_WINDOW_MS,
        }
      : undefined,
  });
}

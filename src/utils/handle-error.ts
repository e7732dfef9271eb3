import { Err, type Result } from "slang-ts";
import type { AppLogger } from "@/logging";

export interface HandleErrorParams {
  message: string;
  data?: unknown;
  logger: AppLogger;
  atFunction?: string;
}

const CALLER_LINE_REGEX = /at\s+(\S+)\s+/;

function inferCallerName(): string {
  const stack = new Error("capture stack trace").stack;
  // [0] message, [1] inferCallerName, [2] handleError, [3] the caller
  const callerLine = stack?.split("\n")[3] ?? "";
  const match = callerLine.match(CALLER_LINE_REGEX);
  return match?.[1] ?? "unknown";
}

/**
 * Logs an error and returns a typed Err result.
 * The error string carries the log ID for traceability: `[logId] message`.
 *
 * @example
 * ```typescript
 * if (!config) {
 *   return handleError({
 *     message: "Configuration missing",
 *     data: { path },
 *     logger,
 *     atFunction: "loadSettings",
 *   });
 * }
 * ```
 */
export function handleError(params: HandleErrorParams): Result<never, string> {
  const atFunction = params.atFunction ?? inferCallerName();
  const logId = params.logger.error({
    atFunction,
    message: params.message,
    data: params.data,
  });
  return Err(`[${logId}] ${params.message}`);
}

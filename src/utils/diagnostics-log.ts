import type { AppLogger } from "@/logging";

interface CreateDiagnosticsLogParams {
  diagnostics?: boolean;
  logger?: AppLogger;
}

/**
 * Creates a centralized diagnostics log function for server internals.
 * Uses the structured logger when one is given, falls back to console.log,
 * respects the diagnostics flag.
 *
 * @param prefix - Component identifier e.g. "TodoServer", "REST"
 * @returns A log function: (message, data?) => void
 */
export function createDiagnosticsLog(
  prefix: string,
  params: CreateDiagnosticsLogParams
): (message: string, data?: unknown) => void {
  if (!params.diagnostics) {
    // biome-ignore lint/suspicious/noEmptyBlockStatements: intentional no-op when diagnostics disabled
    return () => {};
  }

  const { logger } = params;

  return (message: string, data?: unknown) => {
    if (!logger) {
      console.log(`[${prefix}] ${message}`, data ?? "");
      return;
    }

    logger.info({
      atFunction: prefix,
      message: `[${prefix}] ${message}`,
      data,
    });
  };
}

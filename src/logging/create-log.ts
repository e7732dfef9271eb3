import { createLogSink, type Log, type LoggerConfig, writeLog } from "./logger";

type LogInput = Omit<Log, "appName" | "level">;

/** Structured logger handed to the server, the REST layer and handleError */
export interface AppLogger {
  info: (input: LogInput) => string;
  warn: (input: LogInput) => string;
  error: (input: LogInput) => string;
}

/**
 * Creates a logger instance bound to a specific app name.
 * Each method writes one JSON record and returns its log ID.
 * @param appName - The application name (also names the prod log file/directory)
 * @param config - Output mode, chunking and destination overrides
 */
export const createLogger = (
  appName: string,
  config?: LoggerConfig
): AppLogger => {
  const sink = createLogSink(appName, config);
  return {
    info: (input) => writeLog({ ...input, appName, level: "info" }, sink),
    warn: (input) => writeLog({ ...input, appName, level: "warn" }, sink),
    error: (input) => writeLog({ ...input, appName, level: "error" }, sink),
  };
};

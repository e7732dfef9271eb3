import { join } from "node:path";
import { nanoid } from "nanoid";
import pino, { type DestinationStream, type Logger } from "pino";

export type LogLevel = "info" | "warn" | "error";

/**
 * Where records go.
 * - 'dev': stdout
 * - 'prod': the file resolved by resolveLogPath
 * - 'silent': nowhere (ids are still generated)
 */
export type LogMode = "dev" | "prod" | "silent";

export type LogChunking = "monthly" | "daily" | "weekly" | "none";

export interface Log {
  atFunction: string;
  appName: string;
  message: string;
  data?: unknown;
  level?: LogLevel;
  log_id?: string;
}

/** Configuration for log output and file chunking */
export interface LoggerConfig {
  /** Default: 'dev' */
  mode?: LogMode;
  /** Time-based chunking strategy for prod files. Default: 'none' (single file per app) */
  chunking?: LogChunking;
  /** Root directory for prod log files. Default: ./logs under the working directory */
  logDir?: string;
  /** Overrides the mode's destination, e.g. an in-memory stream in tests */
  destination?: DestinationStream;
}

export const defaultLogDir = () => join(process.cwd(), "logs");

/**
 * Resolves the log file path for an app.
 * - 'none' (default): {logDir}/{appName}.log
 * - 'monthly': {logDir}/{appName}/YYYY-MM.log
 * - 'daily': {logDir}/{appName}/YYYY-MM-DD.log
 * - 'weekly': {logDir}/{appName}/YYYY-WNN.log (ISO week number)
 */
export function resolveLogPath(
  appName: string,
  config?: LoggerConfig,
  now: Date = new Date()
): string {
  const logDir = config?.logDir ?? defaultLogDir();
  const chunking = config?.chunking ?? "none";

  if (chunking === "none") {
    return join(logDir, `${appName}.log`);
  }

  return join(logDir, appName, `${formatChunkName(now, chunking)}.log`);
}

/** Formats a date into the chunk filename (without extension) for a chunking strategy */
export function formatChunkName(
  date: Date,
  chunking: Exclude<LogChunking, "none">
): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");

  if (chunking === "monthly") {
    return `${date.getFullYear()}-${month}`;
  }

  if (chunking === "daily") {
    const day = String(date.getDate()).padStart(2, "0");
    return `${date.getFullYear()}-${month}-${day}`;
  }

  // Week-numbering year, which differs from the calendar year around New Year
  const { year, week } = getISOWeek(date);
  return `${year}-W${String(week).padStart(2, "0")}`;
}

/** Returns the ISO 8601 week-numbering year and week for a date */
function getISOWeek(date: Date): { year: number; week: number } {
  const target = new Date(date.getFullYear(), date.getMonth(), date.getDate());
  // Thursday of the same week decides the year (Sunday counts as day 7)
  const dayNum = target.getDay() || 7;
  target.setDate(target.getDate() + 4 - dayNum);
  const yearStart = new Date(target.getFullYear(), 0, 1);
  // Rounded so a DST shift between the two dates cannot move the week
  const dayOfYear = Math.round(
    (target.getTime() - yearStart.getTime()) / 86_400_000
  );
  const week = Math.ceil((dayOfYear + 1) / 7);
  return { year: target.getFullYear(), week };
}

function createPino(mode: LogMode, destination: DestinationStream): Logger {
  return pino(
    {
      level: mode === "silent" ? "silent" : "info",
      base: null,
      timestamp: () => `,"time":"${new Date().toISOString()}"`,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    destination
  );
}

/**
 * Returns a function that yields the pino instance for the current moment.
 * File destinations are reopened only when the resolved path changes (a new
 * chunk starts); every other destination is created once.
 */
export function createLogSink(
  appName: string,
  config: LoggerConfig = {}
): () => Logger {
  const mode = config.mode ?? "dev";
  let current: { target: string; logger: Logger } | null = null;

  return () => {
    let target: string;
    if (config.destination) {
      target = "custom";
    } else if (mode === "prod") {
      target = resolveLogPath(appName, config);
    } else {
      target = "stdout";
    }

    if (current?.target === target) {
      return current.logger;
    }

    let destination: DestinationStream;
    if (config.destination) {
      destination = config.destination;
    } else if (mode === "prod") {
      // Synchronous so records logged right before process.exit reach the file
      destination = pino.destination({ dest: target, mkdir: true, sync: true });
    } else {
      destination = pino.destination(1);
    }

    current = { target, logger: createPino(mode, destination) };
    return current.logger;
  };
}

/**
 * Writes a structured log record through the given sink.
 * @returns The log ID (generated when the record has none)
 * @throws {Error} If appName is missing in the log object
 */
export const writeLog = (log: Log, sink: () => Logger): string => {
  if (!log.appName) {
    throw new Error(`Missing appName in log: ${JSON.stringify(log)}`);
  }

  const level = log.level ?? "info";
  const log_id = log.log_id ?? nanoid(6);

  sink()[level]({
    log_id,
    appName: log.appName,
    atFunction: log.atFunction,
    message: log.message,
    data: log.data ?? null,
  });

  return log_id;
};

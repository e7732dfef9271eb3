// biome-ignore lint/performance/noBarrelFile: Public API entry point for logging module
export { type AppLogger, createLogger } from "./create-log";
export {
  formatChunkName,
  type Log,
  type LogChunking,
  type LoggerConfig,
  type LogLevel,
  type LogMode,
  resolveLogPath,
} from "./logger";

// biome-ignore lint/performance/noBarrelFile: Public API entry point for utilities
export { createDiagnosticsLog } from "./diagnostics-log";
export { type HandleErrorParams, handleError } from "./handle-error";

// biome-ignore lint/performance/noBarrelFile: Public API entry point for the server module
export {
  createTodoServer,
  DEFAULT_SERVER_NAME,
  DEFAULT_VERSION,
} from "./server";
export type { ServerConfig, TodoServer } from "./types";

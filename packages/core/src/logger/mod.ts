export { createLogger, isLogger } from "./logger.ts";
export type { Logger, LoggerConfig, LogLevel } from "./types.ts";

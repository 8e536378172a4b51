/**
 * Shared building blocks for Trellis packages: structured errors and
 * leveled logging.
 *
 * @module
 */

export {
  ConfigurationError,
  isOperationalError,
  isTrellisError,
  PreconditionError,
  TrellisError,
} from "./errors/mod.ts";
export type { ErrorPayload } from "./errors/mod.ts";
export { createLogger, isLogger } from "./logger/mod.ts";
export type { Logger, LoggerConfig, LogLevel } from "./logger/mod.ts";

/**
 * Errors module - structured error handling.
 */

export { TrellisError } from "./base.ts";
export { ConfigurationError, PreconditionError } from "./config.ts";
export { isOperationalError, isTrellisError } from "./guards.ts";
export type { ErrorPayload } from "./types.ts";

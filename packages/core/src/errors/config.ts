/**
 * Programmer-error classes.
 *
 * Both families are thrown at the call site and never retried: they flag
 * mistakes that show up while the application is being wired together.
 */

import { TrellisError } from "./base.ts";

/**
 * Invalid configuration, such as a duplicate registration or a malformed
 * expression.
 */
export class ConfigurationError extends TrellisError {
  constructor(
    message = "Invalid configuration",
    code = "CONFIGURATION_ERROR",
    details?: unknown,
  ) {
    super(message, code, details, false);
    this.name = "ConfigurationError";
  }
}

/**
 * An argument of the wrong type or shape.
 */
export class PreconditionError extends TrellisError {
  constructor(
    message = "Precondition failed",
    code = "PRECONDITION_FAILED",
    details?: unknown,
  ) {
    super(message, code, details, false);
    this.name = "PreconditionError";
  }
}

/**
 * Routing error classes.
 */

import { ConfigurationError, PreconditionError } from "@trellis/core";

/**
 * A rule whose normalized pattern is already registered.
 */
export class DuplicateRuleError extends ConfigurationError {
  readonly pattern: string;
  readonly key: string;

  constructor(pattern: string, key: string) {
    super(
      `Rule "${pattern}" already exists. Use override() to replace it.`,
      "DUPLICATE_RULE",
      { pattern, key },
    );
    this.name = "DuplicateRuleError";
    this.pattern = pattern;
    this.key = key;
  }
}

/**
 * A filter that is not a valid regular expression.
 */
export class InvalidPatternError extends ConfigurationError {
  constructor(message = "Invalid pattern", details?: unknown) {
    super(message, "INVALID_PATTERN", details);
    this.name = "InvalidPatternError";
  }
}

/**
 * A requisite returned something other than a boolean while strict
 * requisites are enabled.
 */
export class RequisiteError extends ConfigurationError {
  constructor(message = "Requisite must return a boolean", details?: unknown) {
    super(message, "INVALID_REQUISITE", details);
    this.name = "RequisiteError";
  }
}

/**
 * An argument of the wrong type or shape.
 */
export class InvalidArgumentError extends PreconditionError {
  constructor(message = "Invalid argument", details?: unknown) {
    super(message, "INVALID_ARGUMENT", details);
    this.name = "InvalidArgumentError";
  }
}

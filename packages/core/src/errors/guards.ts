/**
 * Error inspection utilities.
 */

import { TrellisError } from "./base.ts";

/**
 * Type guard to check if a value is a TrellisError.
 */
export function isTrellisError(error: unknown): error is TrellisError {
  return error instanceof TrellisError;
}

/**
 * Type guard to check if an error is operational (expected).
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof TrellisError) {
    return error.isOperational;
  }
  return false;
}

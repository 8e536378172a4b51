/**
 * Base error class for Trellis.
 */

import type { ErrorPayload } from "./types.ts";

/**
 * Base error class for all Trellis errors.
 *
 * All Trellis errors extend this class, providing a machine-readable
 * code and optional details alongside the message.
 *
 * @example
 * ```typescript
 * throw new TrellisError("Something went wrong", "INTERNAL_ERROR");
 * ```
 */
export class TrellisError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  /** Additional error details (serialized in development mode) */
  readonly details?: unknown;
  /** Whether this error is operational (expected) vs programming error */
  readonly isOperational: boolean;

  constructor(
    message: string,
    code = "INTERNAL_ERROR",
    details?: unknown,
    isOperational = true,
  ) {
    super(message);
    this.name = "TrellisError";
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Convert error to a plain JSON object.
   * @param development Include stack trace and details
   */
  toJSON(development = false): ErrorPayload {
    const payload: ErrorPayload = {
      error: {
        name: this.name,
        message: this.message,
        code: this.code,
      },
    };

    if (development) {
      if (this.details !== undefined) {
        payload.error.details = this.details;
      }
      if (this.stack) {
        payload.error.stack = this.stack.split("\n").map((l) => l.trim());
      }
    }

    return payload;
  }
}

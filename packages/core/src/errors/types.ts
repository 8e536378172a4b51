/**
 * Error type definitions.
 */

/**
 * Serialized error structure.
 */
export interface ErrorPayload {
  error: {
    name: string;
    message: string;
    code: string;
    details?: unknown;
    stack?: string[];
  };
}

/**
 * Custom Application Errors
 * Domain-specific error classes for better error handling.
 */

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export type ExtractionErrorKind = "failed" | "auth" | "timeout" | "cancelled" | "no-audio";

/**
 * A single URL could not be turned into an audio file.
 * Recorded as a per-URL outcome, so it carries no HTTP status.
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly kind: ExtractionErrorKind = "failed"
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

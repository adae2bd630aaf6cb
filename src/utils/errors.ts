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
    public statusCode: number = 500,
    public isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with id '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404);
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

/**
 * Token store miss (410). The user has to send the link again.
 */
export class LookupExpiredError extends AppError {
  constructor(public readonly key: string) {
    super("Link expired. Please send the URL again.", 410);
  }
}

/**
 * A download job failed (502).
 * Every executor failure surfaces as this type or one of its subclasses.
 */
export class DownloadFailedError extends AppError {
  constructor(public readonly reason: string, cause?: unknown) {
    super(`Download failed: ${reason}`, 502);
    if (cause instanceof Error) {
      this.stack = cause.stack;
    }
  }
}

/** The engine could not fetch or parse the source. */
export class ExtractionFailedError extends DownloadFailedError {}

/** Re-encode subprocess failed. The original artifact is preserved. */
export class TranscodeFailedError extends DownloadFailedError {}

/** The engine claimed success but the output file is not there. */
export class MissingOutputError extends DownloadFailedError {}

/**
 * The progress observer is gone (deleted message, webhook 404/410).
 * Stops the progress loop instead of being swallowed.
 */
export class ObserverUnreachableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ObserverUnreachableError";
  }
}

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
      ? `${resource} '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404);
  }
}

/**
 * The extraction engine failed or returned nothing usable (500).
 * Keeps the engine's stack when wrapping one of its errors.
 */
export class ExtractionError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(message, 500);
    if (originalError) {
      this.stack = originalError.stack;
    }
  }
}

/**
 * The video exposes no audio-only stream (500).
 */
export class NoAudioFormatError extends AppError {
  constructor() {
    super("No audio track available (may require login/cookies).", 500);
  }
}

/**
 * yt-dlp reported success but no audio file can be found (500).
 */
export class MissingOutputError extends AppError {
  constructor() {
    super("The audio file was not produced.", 500);
  }
}

/**
 * Extracts a readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

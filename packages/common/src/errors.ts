/**
 * Custom error classes for consistent error handling
 */

/**
 * Base error class for all Starfleet errors
 */
export class StarfleetError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'StarfleetError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * The account index backing source could not be read or parsed.
 * Fatal to the whole run: nothing can be resolved.
 */
export class IndexUnavailableError extends StarfleetError {
  public readonly source?: string;

  constructor(message: string, options?: { source?: string; details?: unknown }) {
    super(message, 'INDEX_UNAVAILABLE', options?.details);
    this.name = 'IndexUnavailableError';
    this.source = options?.source;
  }
}

/**
 * A worker configuration cannot be captured as an immutable snapshot
 */
export class ConfigurationSerializationError extends StarfleetError {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message, 'CONFIGURATION_SERIALIZATION', { path });
    this.name = 'ConfigurationSerializationError';
    this.path = path;
  }
}

/**
 * Invalid or unreadable configuration file
 */
export class ConfigurationError extends StarfleetError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * No worker is registered or configured under the requested name
 */
export class WorkerNotFoundError extends StarfleetError {
  public readonly worker: string;

  constructor(worker: string) {
    super(`Worker '${worker}' not found`, 'WORKER_NOT_FOUND', { worker });
    this.name = 'WorkerNotFoundError';
    this.worker = worker;
  }
}

/**
 * Thrown by worker code when retrying cannot help (bad target, missing access)
 */
export class FatalWorkerError extends StarfleetError {
  constructor(message: string, details?: unknown) {
    super(message, 'FATAL_WORKER_ERROR', details);
    this.name = 'FatalWorkerError';
  }
}

/**
 * Timeout error for operations that exceed time limits
 */
export class TimeoutError extends StarfleetError {
  public readonly timeoutMs?: number;

  constructor(message: string, timeoutMs?: number, details?: unknown) {
    super(message, 'TIMEOUT', details);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Check if an error is a StarfleetError
 */
export function isStarfleetError(error: unknown): error is StarfleetError {
  return error instanceof StarfleetError;
}

/**
 * Wrap an unknown error as a StarfleetError
 */
export function wrapError(error: unknown, defaultMessage = 'An error occurred'): StarfleetError {
  if (error instanceof StarfleetError) return error;
  if (error instanceof Error) {
    return new StarfleetError(error.message, 'UNKNOWN_ERROR', {
      originalName: error.name,
      stack: error.stack,
    });
  }
  return new StarfleetError(defaultMessage, 'UNKNOWN_ERROR', { originalError: error });
}

/**
 * Best-effort message extraction for anything that was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Base class for every error the controllers throw. `status` is the HTTP status the
 * routing layer should answer with; `code` is a stable machine-readable tag.
 */
export class DataError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string,
  ) {
    super(message);
    this.name = 'DataError';
  }
}

/**
 * Custom validation error thrown when input validation fails.
 */
export class ValidationError extends DataError {
  constructor(message: string) {
    super(`Validation Error: ${message}`, 400, 'validation');
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends DataError {
  constructor(what: string) {
    super(`Not found: ${what}`, 404, 'not_found');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends DataError {
  constructor(what: string) {
    super(`Already exists: ${what}`, 409, 'conflict');
    this.name = 'ConflictError';
  }
}

export class ConfigError extends DataError {
  constructor(message: string) {
    super(message, 500, 'config');
    this.name = 'ConfigError';
  }
}

export class HandlerError extends DataError {
  constructor(message: string) {
    super(message, 500, 'handler');
    this.name = 'HandlerError';
  }
}

/** Message of anything thrown, for logs and handler results. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

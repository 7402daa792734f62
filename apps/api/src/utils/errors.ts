/**
 * Request-terminating errors.
 *
 * Only these reach the HTTP layer. Per-file download, compression and
 * archive failures are recorded as strings and never thrown.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 400);
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string) {
    super('FORBIDDEN', message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class InternalError extends AppError {
  constructor(message = 'Internal server error', options?: { cause?: unknown }) {
    super('INTERNAL_ERROR', message, 500);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

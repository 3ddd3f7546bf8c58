import { ZodError } from 'zod';

export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

/** Input relations do not have the shape the reports expect. */
export function preconditionFailed(message: string, details?: unknown, cause?: unknown): HttpError {
  return new HttpError(422, message, details, { cause });
}

/** The database could not execute a read or the cleaning statements. */
export function storageFailure(message: string, cause?: unknown): HttpError {
  return new HttpError(503, message, undefined, { cause });
}

type PgErrorLike = {
  code: string;
  message: string;
};

function isPgError(error: unknown): error is PgErrorLike {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

// undefined_table, undefined_column, datatype_mismatch
const SCHEMA_ERROR_CODES = new Set(['42P01', '42703', '42804']);

export function translateStoreError(error: unknown, action: string): HttpError {
  if (error instanceof HttpError) {
    return error;
  }
  if (error instanceof ZodError) {
    return preconditionFailed(`${action}: dataset does not match the expected schema`, error.issues, error);
  }
  if (isPgError(error) && SCHEMA_ERROR_CODES.has(error.code)) {
    return preconditionFailed(`${action}: ${error.message}`, { code: error.code }, error);
  }
  return storageFailure(`${action}: ${error instanceof Error ? error.message : 'unknown error'}`, error);
}

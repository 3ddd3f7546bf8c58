import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { HttpError } from '../errors.js';

function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({
      message: 'validation_failed',
      issues: err.issues,
    });
  }

  if (isMalformedBody(err)) {
    return res.status(400).json({
      message: 'malformed_json',
    });
  }

  if (err instanceof HttpError) {
    if (err.statusCode >= 500) {
      console.error(`[api] ${err.message}`, err.cause);
    }
    return res.status(err.statusCode).json({
      message: err.message,
      details: err.details,
    });
  }

  console.error('[api] unhandled error', err);
  if (err instanceof Error) {
    return res.status(500).json({
      message: err.message,
    });
  }

  return res.status(500).json({
    message: 'internal_error',
  });
};

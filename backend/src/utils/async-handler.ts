import type { Request, RequestHandler } from 'express';

type JsonProducer = (req: Request) => Promise<unknown>;

/**
 * Wraps an async producer as an express handler: the resolved value is sent as
 * JSON, a rejection goes to the error handler.
 */
export function jsonRoute(fn: JsonProducer, statusCode = 200): RequestHandler {
  return (req, res, next) => {
    fn(req)
      .then((body) => {
        res.status(statusCode).json(body);
      })
      .catch(next);
  };
}

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { IngestError, RateLimitExceeded, StorageUnavailable, ValidationFailure } from '../errors';

export interface HttpReply {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
}

export function ok(body: unknown, status = 200): HttpReply {
  return { status, body };
}

export function notFound(message: string): HttpReply {
  return { status: 404, body: { status: 'error', code: 'NOT_FOUND', message } };
}

export function conflict(message: string): HttpReply {
  return { status: 409, body: { status: 'error', code: 'CONFLICT', message } };
}

export function errorReply(err: IngestError): HttpReply {
  const headers: Record<string, string> = {};
  if (err instanceof RateLimitExceeded || err instanceof StorageUnavailable) {
    headers['Retry-After'] = String(err.retryAfterSeconds);
  }

  const body: Record<string, unknown> = { status: 'error', code: err.code, message: err.message };
  if (err instanceof ValidationFailure) body.details = err.details;

  return { status: err.httpStatus, body, headers };
}

export function sendReply(res: Response, reply: HttpReply): void {
  if (reply.headers) res.set(reply.headers);
  res.status(reply.status).json(reply.body);
}

/** Adapts a reply-returning handler to Express; taxonomy errors become replies, the rest go to the error trap. */
export function route(handler: (req: Request) => Promise<HttpReply>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req)
      .then((reply) => sendReply(res, reply))
      .catch((err: unknown) => {
        if (err instanceof IngestError) sendReply(res, errorReply(err));
        else next(err);
      });
  };
}

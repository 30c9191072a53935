import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import { MethodNotAllowedError, TransferError, errorMessage } from '../errors';

export function readQueryString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return typeof value[0] === 'string' ? value[0] : undefined;
  }
  return undefined;
}

/**
 * Express 4 ignores the promise a handler returns, so rejections are
 * forwarded to the error middleware here.
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function onlyAllow(method: string): RequestHandler {
  return (req, _res, next) => {
    next(new MethodNotAllowedError(req.method, method));
  };
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const status = err instanceof TransferError ? err.statusCode : 500;
  if (status >= 500) {
    console.error(`${req.method} ${req.path} failed:`, err);
  }
  if (err instanceof MethodNotAllowedError) {
    res.setHeader('Allow', err.allowed);
  }

  res.removeHeader('Content-Disposition');
  res.status(status).json({ error: errorMessage(err) });
};

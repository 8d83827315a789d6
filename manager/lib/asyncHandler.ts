/**
 * Async Route Handler
 * Wraps async route handlers to catch errors and pass to Express error handler
 *
 * Also maps ForwardingError subclasses to their HTTP status and JSON body.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ForwardingError, ValidationError } from './errors';
import { log } from './logger';

interface RequestContext {
  method: string;
  url: string;
  ip: string | undefined;
  userAgent: string | undefined;
}

/**
 * Extract request context for error logging
 */
function getRequestContext(req: Request): RequestContext {
  return {
    method: req.method,
    url: req.originalUrl || req.url,
    ip: req.ip || req.socket?.remoteAddress,
    userAgent: req.headers?.['user-agent'],
  };
}

/**
 * Wrap async route handler to catch errors
 */
const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown> | unknown): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      Promise.resolve(fn(req, res, next)).catch(next);
    } catch (err) {
      // Catch sync throws
      next(err);
    }
  };
};

/**
 * Errors raised by express itself (e.g. body-parser) carry a 4xx `status`
 */
function clientErrorStatus(err: unknown): number | null {
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

/**
 * Express error middleware with structured logging
 * Mount this after all routes: app.use(errorMiddleware)
 */
function errorMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const context = getRequestContext(req);

  if (err instanceof ForwardingError) {
    if (err.code >= 500) {
      log.error(`${context.method} ${context.url} failed: ${err.message}`, { type: err.name, details: err.details, ...context });
    } else {
      log.debugFor('api', `${context.method} ${context.url} rejected: ${err.message}`, { type: err.name });
    }
    res.status(err.code).json(err.toJSON());
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null) {
    const message = err instanceof Error ? err.message : 'Bad request';
    const wrapped = new ValidationError(message);
    res.status(clientStatus).json({ ...wrapped.toJSON(), code: clientStatus });
    return;
  }

  log.error(`${context.method} ${context.url} failed unexpectedly`, {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    ...context,
  });

  const message = process.env.NODE_ENV === 'production' || !(err instanceof Error)
    ? 'Internal server error'
    : err.message;
  res.status(500).json(new ForwardingError(message).toJSON());
}

export default asyncHandler;
export { asyncHandler, errorMiddleware, getRequestContext };

/**
 * Static bearer token check
 * When ACCESS_TOKEN is configured, API routes require `Authorization: Bearer <token>`
 */

import crypto from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { log } from '../logger';

/**
 * Constant-time token comparison
 */
function tokensMatch(expected: string, provided: string): boolean {
  const expectedBuffer = Buffer.from(expected, 'utf8');
  const providedBuffer = Buffer.from(provided, 'utf8');
  return expectedBuffer.length === providedBuffer.length &&
    crypto.timingSafeEqual(expectedBuffer, providedBuffer);
}

/**
 * Middleware requiring the configured bearer token.
 * A null token disables the check.
 */
function createRequireToken(accessToken: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (accessToken === null) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    if (!tokensMatch(accessToken, authHeader.slice(7))) {
      log.warn('Rejected request with invalid access token', { ip: req.ip, url: req.originalUrl });
      res.status(401).json({ error: 'Invalid access token' });
      return;
    }

    next();
  };
}

export {
  tokensMatch,
  createRequireToken,
};

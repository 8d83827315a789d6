/**
 * API Routes - Combined router
 * Mounts sub-routers for status and sessions endpoints.
 *
 * `/` and `/health` need no token. Everything mounted after the token check
 * needs `Authorization: Bearer <ACCESS_TOKEN>` when one is configured.
 */

import express, { Request, Response, Router } from 'express';
import { createRequireToken } from '../../lib/auth/token';
import { log } from '../../lib/logger';
import type { SessionRegistry } from '../../lib/state';
import { createStatusRouter } from './status';
import { createSessionsRouter } from './sessions';

export interface ApiRouterOptions {
  accessToken: string | null;
}

export function createApiRouter(registry: SessionRegistry, options: ApiRouterOptions): Router {
  const router = express.Router();

  router.use(express.json());

  // Logging middleware for mutating requests
  router.use((req: Request, _res: Response, next: () => void) => {
    if (req.method !== 'GET') {
      log.api(`${req.method} ${req.path}`, req.body || {});
    }
    next();
  });

  // Mount sub-routers
  router.use('/', createStatusRouter(registry));
  router.use(createRequireToken(options.accessToken));
  router.use('/', createSessionsRouter(registry));

  return router;
}

export default createApiRouter;

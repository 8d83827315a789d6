/**
 * Session routes
 * Open, inspect and close forwarding sessions.
 *
 * /open_proxy and /close_proxy keep the query-string interface older clients
 * call; they share handlers with the REST routes.
 */

import express, { Request, Response, Router } from 'express';
import { asyncHandler } from '../../lib/asyncHandler';
import { NotFoundError, TeardownError } from '../../lib/errors';
import { log } from '../../lib/logger';
import type { Session, SessionRegistry, SessionSummary } from '../../lib/state';
import { parseInput, schemas, validate } from '../../lib/validation';

interface OpenedSessionBody {
  session_id: string;
  ingress_port: number;
  target_ip: string;
  target_port: number;
}

interface SessionInfoBody {
  ingress_port: number;
  target_ip: string;
  target_port: number;
  created_at: string;
}

interface ClosedSessionBody {
  status: 'closed';
  session_id: string;
  warnings?: string[];
}

function openedBody(session: Session): OpenedSessionBody {
  return {
    session_id: session.id,
    ingress_port: session.ingressPort,
    target_ip: session.target.ip,
    target_port: session.target.port,
  };
}

function infoBody(summary: SessionSummary): SessionInfoBody {
  return {
    ingress_port: summary.ingressPort,
    target_ip: summary.target.ip,
    target_port: summary.target.port,
    created_at: summary.createdAt,
  };
}

export function createSessionsRouter(registry: SessionRegistry): Router {
  const router = express.Router();

  async function openSession(input: unknown): Promise<OpenedSessionBody> {
    const { target_ip, target_port } = parseInput(schemas.openSession, input);
    const session = await registry.open(target_ip, target_port);
    return openedBody(session);
  }

  // Rule removal failures still reclaim the session, so they are reported as warnings
  async function closeSession(sessionId: string): Promise<ClosedSessionBody> {
    try {
      await registry.close(sessionId);
      return { status: 'closed', session_id: sessionId };
    } catch (err) {
      if (err instanceof TeardownError) {
        log.error('Session closed with teardown failures', { sessionId, details: err.details });
        return { status: 'closed', session_id: sessionId, warnings: [err.message] };
      }
      throw err;
    }
  }

  router.post('/sessions', asyncHandler(async (req: Request, res: Response) => {
    res.status(201).json(await openSession(req.body));
  }));

  router.get('/sessions', (_req: Request, res: Response) => {
    const sessions: Record<string, SessionInfoBody> = {};
    for (const summary of registry.list()) {
      sessions[summary.id] = infoBody(summary);
    }
    res.json(sessions);
  });

  router.get('/sessions/:id', validate(schemas.sessionIdParam, 'params'), (req: Request, res: Response) => {
    const summary = registry.get(req.params.id);
    if (!summary) {
      throw new NotFoundError('Session not found', { sessionId: req.params.id });
    }
    res.json({ session_id: summary.id, ...infoBody(summary) });
  });

  router.delete('/sessions/:id', validate(schemas.sessionIdParam, 'params'), asyncHandler(async (req: Request, res: Response) => {
    res.json(await closeSession(req.params.id));
  }));

  // Query-string interface
  router.get('/open_proxy', asyncHandler(async (req: Request, res: Response) => {
    log.api('GET /open_proxy', { target_ip: req.query.target_ip, target_port: req.query.target_port });
    res.json(await openSession(req.query));
  }));

  router.get('/close_proxy', asyncHandler(async (req: Request, res: Response) => {
    const { session_id } = parseInput(schemas.closeSession, req.query);
    log.api('GET /close_proxy', { session_id });
    res.json(await closeSession(session_id));
  }));

  return router;
}

export default createSessionsRouter;

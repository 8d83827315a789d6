import express, { Request, Response, Router } from 'express';
import { asyncHandler } from '../../lib/asyncHandler';
import type { SessionRegistry } from '../../lib/state';

export function createStatusRouter(registry: SessionRegistry): Router {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Port-forwarding session manager is running' });
  });

  // Health check - 503 when the NAT provider cannot be reached
  router.get('/health', asyncHandler(async (_req: Request, res: Response) => {
    const report = await registry.health();
    const body = {
      status: report.providerReachable ? 'ok' : 'degraded',
      provider: report.providerReachable ? 'reachable' : 'unreachable',
      ...(report.providerError !== undefined && { providerError: report.providerError }),
      activeSessions: report.activeSessions,
      freePorts: report.freePorts,
      totalPorts: report.totalPorts,
    };
    res.status(report.providerReachable ? 200 : 503).json(body);
  }));

  return router;
}

export default createStatusRouter;

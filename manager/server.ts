/**
 * Port-forwarding session manager
 * Main Express server - orchestration only
 *
 * Business logic is in services/ and lib/
 * API routes are in routes/
 */

import express, { Express, Request, Response } from 'express';
import http from 'http';
import { loadConfig, loadDotenv } from './config';
import type { AppConfig } from './config';
import { errorMiddleware } from './lib/asyncHandler';
import { NotFoundError, ProviderUnavailableError, errorDetails, errorMessage } from './lib/errors';
import { log } from './lib/logger';
import { PortPool } from './lib/ports';
import { SessionRegistry } from './lib/state';
import createApiRouter from './routes/api';
import type { NatRuleProvider } from './services/nat-provider';
import NftablesProvider from './services/nftables';

export interface AppDeps {
  registry: SessionRegistry;
  accessToken: string | null;
}

/**
 * Build the Express app around an existing registry (no listening, no provider calls)
 */
export function createApp({ registry, accessToken }: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use('/', createApiRouter(registry, { accessToken }));

  // Unknown routes get the same JSON error shape as everything else
  app.use((req: Request, res: Response) => {
    const err = new NotFoundError(`No route for ${req.method} ${req.path}`);
    res.status(err.code).json(err.toJSON());
  });

  app.use(errorMiddleware);
  return app;
}

export function createRegistry(config: AppConfig, provider: NatRuleProvider): SessionRegistry {
  const pool = new PortPool(config.portRange.start, config.portRange.end);
  return new SessionRegistry(provider, pool, {
    ruleGroupPrefix: config.ruleGroupPrefix,
    providerTimeoutMs: config.nft.timeoutMs,
  });
}

/**
 * Load config, prepare the NAT provider, then listen.
 * Exits the process when the configuration is invalid or the provider is unusable.
 */
async function main(): Promise<void> {
  const applied = loadDotenv();
  if (applied > 0) {
    log.debug(`Loaded ${applied} variable(s) from .env`);
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    log.error(errorMessage(err));
    process.exit(1);
  }

  const provider = new NftablesProvider(config.nft);
  const registry = createRegistry(config, provider);

  try {
    await registry.bootstrap();
  } catch (err) {
    log.error('Cannot start: NAT provider unavailable', {
      error: errorMessage(err),
      ...(err instanceof ProviderUnavailableError && { details: err.details }),
    });
    process.exit(1);
  }

  if (config.sweepOrphans) {
    try {
      await registry.sweepOrphans();
    } catch (err) {
      log.warn('Orphan sweep skipped', { error: errorMessage(err) });
    }
  }

  const app = createApp({ registry, accessToken: config.accessToken });
  const server: http.Server = app.listen(config.port, config.host, () => {
    log.info(`Session manager listening on ${config.host}:${config.port}`, {
      portRange: `${config.portRange.start}-${config.portRange.end}`,
      table: `${config.nft.family} ${config.nft.table}`,
      auth: config.accessToken ? 'bearer token' : 'disabled',
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, closing sessions`);

    // Stop taking requests first; requests already in flight still finish
    server.close(() => log.info('Server closed'));
    server.closeIdleConnections();

    void registry.closeAll()
      .catch((err: unknown) => {
        log.error('Failed to close sessions on shutdown', errorDetails(err));
      })
      .finally(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    log.error('Fatal startup error', errorDetails(err));
    process.exit(1);
  });
}

import http from 'http';
import { PortPool } from '../../lib/ports';
import { SessionRegistry } from '../../lib/state';
import { createApp } from '../../server';
import { FakeNatProvider } from '../helpers/fake-provider';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

interface Harness {
  provider: FakeNatProvider;
  pool: PortPool;
  baseUrl: string;
  server: http.Server;
}

interface JsonResponse {
  status: number;
  body: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function start(options: { accessToken?: string | null; ports?: [number, number] } = {}): Promise<Harness> {
  const [first, last] = options.ports ?? [10000, 10001];
  const provider = new FakeNatProvider();
  const pool = new PortPool(first, last);
  const registry = new SessionRegistry(provider, pool, { ruleGroupPrefix: 'proxy_', providerTimeoutMs: 1000 });
  const app = createApp({ registry, accessToken: options.accessToken ?? null });

  const server = http.createServer(app);
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  return { provider, pool, server, baseUrl: `http://127.0.0.1:${address.port}` };
}

async function stop(harness: Harness): Promise<void> {
  harness.server.closeAllConnections();
  await new Promise<void>(resolve => harness.server.close(() => resolve()));
}

async function call(harness: Harness, path: string, init: RequestInit = {}): Promise<JsonResponse> {
  const res = await fetch(`${harness.baseUrl}${path}`, init);
  const body: unknown = await res.json();
  if (!isRecord(body)) {
    throw new Error(`expected a JSON object from ${path}`);
  }
  return { status: res.status, body };
}

function postJson(body: string): RequestInit {
  return { method: 'POST', headers: { 'Content-Type': 'application/json' }, body };
}

describe('HTTP API', () => {
  let harness: Harness;

  afterEach(async () => {
    await stop(harness);
  });

  describe('status routes', () => {
    beforeEach(async () => {
      harness = await start();
    });

    it('should answer GET /', async () => {
      await expect(call(harness, '/')).resolves.toEqual({
        status: 200,
        body: { message: 'Port-forwarding session manager is running' },
      });
    });

    it('should report health with pool usage', async () => {
      await expect(call(harness, '/health')).resolves.toEqual({
        status: 200,
        body: { status: 'ok', provider: 'reachable', activeSessions: 0, freePorts: 2, totalPorts: 2 },
      });
    });

    it('should report a degraded service when the provider is unreachable', async () => {
      harness.provider.reachable = false;

      await expect(call(harness, '/health')).resolves.toEqual({
        status: 503,
        body: {
          status: 'degraded',
          provider: 'unreachable',
          providerError: 'fake listTables (exit 1): provider unreachable',
          activeSessions: 0,
          freePorts: 2,
          totalPorts: 2,
        },
      });
    });

    it('should answer unknown routes with a JSON 404', async () => {
      const res = await call(harness, '/nope');

      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: 'No route for GET /nope', code: 404, type: 'NotFoundError' });
    });
  });

  describe('session routes', () => {
    beforeEach(async () => {
      harness = await start();
    });

    it('should open, list, show and close a session', async () => {
      const opened = await call(harness, '/sessions', postJson(JSON.stringify({ target_ip: '10.0.0.5', target_port: 51820 })));

      expect(opened.status).toBe(201);
      expect(opened.body).toEqual({
        session_id: expect.stringMatching(UUID_V4),
        ingress_port: 10000,
        target_ip: '10.0.0.5',
        target_port: 51820,
      });
      const id = String(opened.body.session_id);

      const listed = await call(harness, '/sessions');
      expect(listed.body).toEqual({
        [id]: { ingress_port: 10000, target_ip: '10.0.0.5', target_port: 51820, created_at: expect.any(String) },
      });

      const shown = await call(harness, `/sessions/${id}`);
      expect(shown).toEqual({
        status: 200,
        body: { session_id: id, ingress_port: 10000, target_ip: '10.0.0.5', target_port: 51820, created_at: expect.any(String) },
      });

      await expect(call(harness, `/sessions/${id}`, { method: 'DELETE' })).resolves.toEqual({
        status: 200,
        body: { status: 'closed', session_id: id },
      });
      expect(harness.pool.freeCount).toBe(2);
      expect(harness.provider.isClean()).toBe(true);

      const again = await call(harness, `/sessions/${id}`, { method: 'DELETE' });
      expect(again.status).toBe(404);
      expect(again.body).toMatchObject({ error: 'Session not found', type: 'NotFoundError', details: { sessionId: id } });
    });

    it('should return 404 for a session that does not exist', async () => {
      const res = await call(harness, '/sessions/00000000-0000-4000-8000-000000000000');
      expect(res.status).toBe(404);
      expect(res.body.type).toBe('NotFoundError');
    });

    it('should reject a malformed session id', async () => {
      const res = await call(harness, '/sessions/bad$id', { method: 'DELETE' });
      expect(res.status).toBe(400);
      expect(res.body.type).toBe('ValidationError');
    });

    it('should list the fields a request is missing', async () => {
      const res = await call(harness, '/sessions', postJson('{}'));

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({
        error: 'Validation failed',
        type: 'ValidationError',
        details: {
          fields: [
            { field: 'target_ip', message: '"target_ip" is required' },
            { field: 'target_port', message: '"target_port" is required' },
          ],
        },
      });
      expect(harness.pool.allocatedCount).toBe(0);
    });

    it('should reject an invalid target IP', async () => {
      const res = await call(harness, '/sessions', postJson(JSON.stringify({ target_ip: 'not-an-ip', target_port: 1 })));

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ type: 'ValidationError', details: { fields: [{ field: 'target_ip' }] } });
    });

    it('should reject a body that is not JSON', async () => {
      const res = await call(harness, '/sessions', postJson('{"target_ip":'));

      expect(res.status).toBe(400);
      expect(res.body.type).toBe('ValidationError');
    });

    it('should map a failed install to 500 with the failed step', async () => {
      harness.provider.failOn('addDispatchRule');

      const res = await call(harness, '/sessions', postJson(JSON.stringify({ target_ip: '10.0.0.5', target_port: 51820 })));

      expect(res.status).toBe(500);
      expect(res.body).toMatchObject({ type: 'ProvisioningError', code: 500, details: { step: 'dispatch' } });
      expect(harness.pool.freeCount).toBe(2);
    });

    it('should close with warnings when rule removal fails', async () => {
      const opened = await call(harness, '/sessions', postJson(JSON.stringify({ target_ip: '10.0.0.5', target_port: 51820 })));
      const id = String(opened.body.session_id);
      harness.provider.failEverything();

      await expect(call(harness, `/sessions/${id}`, { method: 'DELETE' })).resolves.toEqual({
        status: 200,
        body: {
          status: 'closed',
          session_id: id,
          warnings: ['Some forwarding rules could not be removed; session reclaimed'],
        },
      });
      expect(harness.pool.freeCount).toBe(2);
    });
  });

  describe('query-string routes', () => {
    beforeEach(async () => {
      harness = await start();
    });

    it('should open and close through /open_proxy and /close_proxy', async () => {
      const opened = await call(harness, '/open_proxy?target_ip=10.0.0.5&target_port=51820');

      expect(opened.status).toBe(200);
      expect(opened.body).toMatchObject({ ingress_port: 10000, target_ip: '10.0.0.5', target_port: 51820 });
      const id = String(opened.body.session_id);

      await expect(call(harness, `/close_proxy?session_id=${id}`)).resolves.toEqual({
        status: 200,
        body: { status: 'closed', session_id: id },
      });
      expect(harness.provider.isClean()).toBe(true);
    });

    it('should reject a non-numeric port', async () => {
      const res = await call(harness, '/open_proxy?target_ip=10.0.0.5&target_port=abc');
      expect(res.status).toBe(400);
    });

    it('should require a session id to close', async () => {
      const res = await call(harness, '/close_proxy');
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ details: { fields: [{ field: 'session_id' }] } });
    });
  });

  it('should answer 503 once every port is taken', async () => {
    harness = await start({ ports: [10000, 10000] });
    await call(harness, '/open_proxy?target_ip=10.0.0.5&target_port=51820');

    const res = await call(harness, '/open_proxy?target_ip=10.0.0.6&target_port=51820');

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ type: 'ResourceExhaustedError', details: { range: '10000-10000', allocated: 1 } });
  });

  describe('access token', () => {
    beforeEach(async () => {
      harness = await start({ accessToken: 'test-secret' });
    });

    it('should require a bearer token for session routes', async () => {
      await expect(call(harness, '/sessions')).resolves.toEqual({
        status: 401,
        body: { error: 'Authentication required' },
      });
    });

    it('should reject a wrong token', async () => {
      await expect(call(harness, '/sessions', { headers: { Authorization: 'Bearer wrong-secret' } })).resolves.toEqual({
        status: 401,
        body: { error: 'Invalid access token' },
      });
    });

    it('should accept the configured token', async () => {
      await expect(call(harness, '/sessions', { headers: { Authorization: 'Bearer test-secret' } })).resolves.toEqual({
        status: 200,
        body: {},
      });
    });

    it('should leave / and /health open', async () => {
      expect((await call(harness, '/')).status).toBe(200);
      expect((await call(harness, '/health')).status).toBe(200);
    });
  });
});

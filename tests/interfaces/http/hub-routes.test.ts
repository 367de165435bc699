import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { createHub } from '../../../src/application/hub.js';
import type { Hub } from '../../../src/application/hub.js';
import { createInMemoryStores } from '../../../src/infrastructure/memory/in-memory-stores.js';
import {
  authRoutes,
  commandRoutes,
  errorHandler,
  healthRoutes,
  hubPlugin,
  settingsRoutes,
  spokeRoutes,
  transitionRoutes,
  userRoutes,
} from '../../../src/interfaces/http/index.js';
import { fakeConnectors, fakeLogger, testHubSettings, TEST_API_KEY } from '../../helpers.js';

const UNREACHABLE = '10.0.0.6:49950';

async function buildApp(hub: Hub): Promise<FastifyInstance> {
  const app = Fastify();
  await app.register(errorHandler);
  await app.register(hubPlugin, { hub });
  await app.register(healthRoutes);
  await app.register(authRoutes);
  await app.register(spokeRoutes);
  await app.register(commandRoutes);
  await app.register(transitionRoutes);
  await app.register(settingsRoutes);
  await app.register(userRoutes);
  await app.ready();
  return app;
}

describe('hub HTTP API', () => {
  let hub: Hub;
  let app: FastifyInstance;
  let adminToken: string;

  async function login(username: string, password: string): Promise<string> {
    const res = await app.inject({ method: 'POST', url: '/api/v1/auth/login', payload: { username, password } });
    expect(res.statusCode).toBe(200);
    const body: { access_token: string } = res.json();
    return body.access_token;
  }

  function auth(token: string) {
    return { authorization: `Bearer ${token}` };
  }

  async function registerSpoke(payload: Record<string, unknown> = {}) {
    return app.inject({
      method: 'POST',
      url: '/api/v1/spokes',
      headers: auth(adminToken),
      payload: { name: 'eu-west-1', address: '10.0.0.5:49950', api_key: TEST_API_KEY, allowed_source_ip: '127.0.0.1', ...payload },
    });
  }

  async function registerOnlineSpoke(payload: Record<string, unknown> = {}): Promise<string> {
    const res = await registerSpoke(payload);
    const body: { id: string } = res.json();
    await vi.waitFor(() => expect(hub.registry.get(body.id).status).toBe('online'));
    return body.id;
  }

  beforeEach(async () => {
    vi.restoreAllMocks();
    hub = createHub({
      settings: testHubSettings(),
      stores: createInMemoryStores(),
      log: fakeLogger(),
      connectors: () => fakeConnectors(new Set([UNREACHABLE])),
      publishTransition: async () => undefined,
    });
    await hub.start();
    app = await buildApp(hub);
    adminToken = await login('admin', 'test-password');
  });

  afterEach(async () => {
    await app.close();
    await hub.stop();
  });

  describe('auth', () => {
    it('serves health without a token', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        status: 'ok',
        fleet: { pending: 0, online: 0, degraded: 0, offline: 0 },
        log_relay: { upstreams: 0, subscriptions: 0 },
      });
    });

    it('requires a bearer token', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/spokes' });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'Unauthenticated', message: 'Missing bearer token' });
    });

    it('rejects bad credentials', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/auth/login',
        payload: { username: 'admin', password: 'wrong-password' },
      });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'Unauthenticated', message: 'Invalid credentials' });
    });

    it('revokes the token on logout', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/auth/logout', headers: auth(adminToken) });
      expect(res.statusCode).toBe(204);

      const after = await app.inject({ method: 'GET', url: '/api/v1/spokes', headers: auth(adminToken) });
      expect(after.statusCode).toBe(401);
      expect(after.json()).toEqual({ error: 'Unauthenticated', message: 'Session token rejected (revoked)' });
    });

    it('enforces roles', async () => {
      const created = await app.inject({
        method: 'POST',
        url: '/api/v1/users',
        headers: auth(adminToken),
        payload: { username: 'alice', password: 'test-password', role: 'viewer' },
      });
      expect(created.statusCode).toBe(201);
      expect(created.json()).toMatchObject({ username: 'alice', role: 'viewer' });

      const viewerToken = await login('alice', 'test-password');
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/spokes',
        headers: auth(viewerToken),
        payload: { name: 's', address: '10.0.0.9', api_key: TEST_API_KEY },
      });
      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({ error: 'Unauthorized', message: 'Requires role admin' });
    });
  });

  describe('spokes', () => {
    it('registers, re-registers and hides key material', async () => {
      const first = await registerSpoke();
      expect(first.statusCode).toBe(201);
      const spoke: Record<string, unknown> = first.json();
      expect(spoke).toMatchObject({ name: 'eu-west-1', status: 'pending', allowed_source_ip: '127.0.0.1' });
      expect(spoke).not.toHaveProperty('api_key_hash');
      expect(spoke).not.toHaveProperty('api_key_sealed');

      const second = await registerSpoke();
      expect(second.statusCode).toBe(200);
      expect(second.json()).toMatchObject({ id: spoke['id'] });
    });

    it('refuses another name at a registered address', async () => {
      await registerSpoke();
      const res = await registerSpoke({ name: 'other' });
      expect(res.statusCode).toBe(409);
      expect(res.json()).toMatchObject({ error: 'Conflict' });
    });

    it('validates the registration body', async () => {
      const res = await registerSpoke({ api_key: 'short' });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ error: 'ValidationError', message: 'Invalid spoke registration' });
    });

    it('removes a spoke', async () => {
      const id = await registerOnlineSpoke();
      const res = await app.inject({ method: 'DELETE', url: `/api/v1/spokes/${id}`, headers: auth(adminToken) });
      expect(res.statusCode).toBe(204);

      const gone = await app.inject({ method: 'GET', url: `/api/v1/spokes/${id}`, headers: auth(adminToken) });
      expect(gone.statusCode).toBe(404);
      expect(gone.json()).toEqual({ error: 'NotFound', message: `Spoke ${id} not found` });
    });

    it('returns recent heartbeats', async () => {
      const id = await registerOnlineSpoke();
      const res = await app.inject({ method: 'GET', url: `/api/v1/spokes/${id}/heartbeats`, headers: auth(adminToken) });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual([
        expect.objectContaining({ spoke_id: id, reachable: true, metrics: { cpu_percent: 1, ram_percent: 2, disk_percent: 3 } }),
      ]);
    });
  });

  describe('commands', () => {
    it('issues a command and accepts the spoke’s completion report', async () => {
      const id = await registerOnlineSpoke();

      const issued = await app.inject({
        method: 'POST',
        url: `/api/v1/spokes/${id}/commands`,
        headers: auth(adminToken),
        payload: { verb: 'restart', target_instance: 'survival-1' },
      });
      expect(issued.statusCode).toBe(202);
      const command: { command_id: string } = issued.json();
      expect(issued.json()).toMatchObject({ state: 'sent', action: 'restart', issued_by: 'admin' });

      const reported = await app.inject({
        method: 'POST',
        url: `/api/v1/spokes/${id}/commands/${command.command_id}/result`,
        headers: { 'x-api-key': TEST_API_KEY },
        payload: { succeeded: true, detail: 'restarted', exit_code: 0 },
      });
      expect(reported.statusCode).toBe(200);
      expect(reported.json()).toMatchObject({ state: 'succeeded', result_detail: 'restarted' });

      const fetched = await app.inject({ method: 'GET', url: `/api/v1/commands/${command.command_id}`, headers: auth(adminToken) });
      expect(fetched.json()).toMatchObject({ state: 'succeeded' });
    });

    it('refuses a completion report with the wrong key', async () => {
      const id = await registerOnlineSpoke();
      const issued = await app.inject({
        method: 'POST',
        url: `/api/v1/spokes/${id}/commands`,
        headers: auth(adminToken),
        payload: { verb: 'start', target_instance: 'survival-1' },
      });
      const command: { command_id: string } = issued.json();

      const res = await app.inject({
        method: 'POST',
        url: `/api/v1/spokes/${id}/commands/${command.command_id}/result`,
        headers: { 'x-api-key': 'wrong-api-key-0000' },
        payload: { succeeded: true },
      });
      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({ error: 'Unauthorized', message: 'Invalid spoke credentials' });
    });

    it('refuses a valid key from an address outside the allowlist', async () => {
      const id = await registerOnlineSpoke({ allowed_source_ip: '10.0.0.5' });
      const issued = await app.inject({
        method: 'POST',
        url: `/api/v1/spokes/${id}/commands`,
        headers: auth(adminToken),
        payload: { verb: 'start', target_instance: 'survival-1' },
      });
      const command: { command_id: string } = issued.json();

      const res = await app.inject({
        method: 'POST',
        url: `/api/v1/spokes/${id}/commands/${command.command_id}/result`,
        headers: { 'x-api-key': TEST_API_KEY },
        remoteAddress: '10.0.0.9',
        payload: { succeeded: true },
      });
      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({
        error: 'ForbiddenSourceIP',
        message: 'Source IP 10.0.0.9 is not allowed for this spoke',
      });
    });

    it('refuses a command for a spoke that never answered', async () => {
      const res0 = await registerSpoke({ address: UNREACHABLE });
      const spoke: { id: string } = res0.json();
      await hub.monitor.pollOnce(spoke.id);
      expect(hub.registry.get(spoke.id).status).toBe('pending');

      const res = await app.inject({
        method: 'POST',
        url: `/api/v1/spokes/${spoke.id}/commands`,
        headers: auth(adminToken),
        payload: { verb: 'start', target_instance: 'survival-1' },
      });
      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({ error: 'SpokeUnreachable', message: 'Spoke eu-west-1 is pending' });
      await expect(hub.stores.commands.listBySpoke(spoke.id, 10)).resolves.toEqual([]);
    });

    it('lists commands newest first', async () => {
      const id = await registerOnlineSpoke();
      for (const verb of ['start', 'stop']) {
        await app.inject({
          method: 'POST',
          url: `/api/v1/spokes/${id}/commands`,
          headers: auth(adminToken),
          payload: { verb, target_instance: 'survival-1' },
        });
      }

      const res = await app.inject({ method: 'GET', url: `/api/v1/spokes/${id}/commands`, headers: auth(adminToken) });
      const listed: Array<{ verb: string; state: string }> = res.json();
      expect(listed.map((c) => [c.verb, c.state])).toEqual([
        ['stop', 'queued'],
        ['start', 'sent'],
      ]);
    });
  });

  describe('transitions and settings', () => {
    it('pages transition history', async () => {
      const id = await registerOnlineSpoke();
      await vi.waitFor(async () => expect(await hub.stores.transitions.list({ limit: 10, offset: 0 })).toHaveLength(1));

      const res = await app.inject({ method: 'GET', url: `/api/v1/transitions?spoke_id=${id}`, headers: auth(adminToken) });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        data: [expect.objectContaining({ spoke_id: id, from_status: 'pending', to_status: 'online' })],
        pagination: { limit: 100, offset: 0, count: 1 },
      });
    });

    it('stores the webhook URL', async () => {
      const put = await app.inject({
        method: 'PUT',
        url: '/api/v1/settings/notifications',
        headers: auth(adminToken),
        payload: { webhook_url: 'https://hooks.example.test/fleet' },
      });
      expect(put.statusCode).toBe(200);

      const get = await app.inject({ method: 'GET', url: '/api/v1/settings/notifications', headers: auth(adminToken) });
      expect(get.json()).toEqual({ webhook_url: 'https://hooks.example.test/fleet' });
    });

    it('rejects a non-http webhook URL', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: '/api/v1/settings/notifications',
        headers: auth(adminToken),
        payload: { webhook_url: 'ftp://hooks.example.test' },
      });
      expect(res.statusCode).toBe(400);
    });
  });

  it('answers unknown routes with NotFound', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/nope' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'NotFound', message: 'Route GET /api/v1/nope not found' });
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createHub } from '../../src/application/hub.js';
import type { Hub } from '../../src/application/hub.js';
import { createInMemoryStores } from '../../src/infrastructure/memory/in-memory-stores.js';
import type { LogDelivery } from '../../src/application/log-relay.js';
import type { TransitionEvent } from '../../src/domain/index.js';
import { fakeConnectors, fakeLogger, testHubSettings, TEST_API_KEY } from '../helpers.js';

describe('createHub', () => {
  let hub: Hub;
  let connectors: ReturnType<typeof fakeConnectors>;
  let published: TransitionEvent[];

  beforeEach(async () => {
    vi.restoreAllMocks();
    connectors = fakeConnectors();
    published = [];
    hub = createHub({
      settings: testHubSettings(),
      stores: createInMemoryStores(),
      log: fakeLogger(),
      connectors: () => connectors,
      publishTransition: async (event) => {
        published.push(event);
      },
    });
    await hub.start();
  });

  afterEach(async () => {
    await hub.stop();
  });

  it('creates the bootstrap admin on start', async () => {
    await expect(hub.stores.users.findByUsername('admin')).resolves.toMatchObject({ role: 'admin' });
    await expect(hub.auth.login('admin', 'test-password', '127.0.0.1')).resolves.toMatchObject({ token_type: 'Bearer' });
  });

  it('polls a newly registered spoke and records its transition', async () => {
    const { spoke } = await hub.registry.register({ name: 's1', address: '10.0.0.5', api_key: TEST_API_KEY });
    expect(hub.monitor.isTracking(spoke.id)).toBe(true);

    await vi.waitFor(() => expect(published).toHaveLength(1));
    expect(published[0]).toMatchObject({ spoke_id: spoke.id, from_status: 'pending', to_status: 'online' });
    await expect(hub.stores.transitions.list({ limit: 10, offset: 0 })).resolves.toHaveLength(1);
  });

  it('cancels heartbeat, commands and log streams when a spoke is removed', async () => {
    const { spoke } = await hub.registry.register({ name: 's1', address: '10.0.0.5', api_key: TEST_API_KEY });
    await vi.waitFor(() => expect(hub.registry.get(spoke.id).status).toBe('online'));

    const command = await hub.dispatcher.dispatch({
      spokeId: spoke.id,
      verb: 'restart',
      targetInstance: 'survival-1',
      issuer: { username: 'admin', role: 'admin' },
    });
    const closed: string[] = [];
    hub.relay.subscribe(spoke.id, {
      send: (_item: LogDelivery) => undefined,
      close: (reason) => closed.push(reason),
    });

    await hub.registry.remove(spoke.id);

    expect(hub.monitor.isTracking(spoke.id)).toBe(false);
    expect(closed).toEqual(['spoke removed']);
    expect(connectors.upstreams[0]?.closed).toBe(true);
    await expect(hub.stores.commands.findById(command.command_id)).resolves.toMatchObject({
      state: 'failed',
      result_detail: 'spoke removed',
    });
  });

  it('settles commands an earlier hub left open when it starts over the same stores', async () => {
    const { spoke } = await hub.registry.register({ name: 's1', address: '10.0.0.5', api_key: TEST_API_KEY });
    await vi.waitFor(() => expect(hub.registry.get(spoke.id).status).toBe('online'));
    const command = await hub.dispatcher.dispatch({
      spokeId: spoke.id,
      verb: 'restart',
      targetInstance: 'survival-1',
      issuer: { username: 'admin', role: 'admin' },
    });

    const restarted = createHub({
      settings: testHubSettings(),
      stores: hub.stores,
      log: fakeLogger(),
      connectors: () => fakeConnectors(),
      publishTransition: async () => undefined,
    });
    await restarted.start();

    await expect(hub.stores.commands.findById(command.command_id)).resolves.toMatchObject({
      state: 'timed_out',
      result_detail: 'hub restarted before the spoke acknowledged',
    });
    await restarted.stop();
  });
});

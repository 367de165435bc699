import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CommandDispatcher } from '../../src/application/command-dispatcher.js';
import type { CommandTransport, TransportResult } from '../../src/application/command-dispatcher.js';
import type { FleetRegistry } from '../../src/application/fleet-registry.js';
import { InMemoryCommandStore } from '../../src/infrastructure/memory/in-memory-stores.js';
import type { Command, Principal, Spoke } from '../../src/domain/index.js';
import { deferred, fakeLogger, flush, makeRegistry, TEST_API_KEY } from '../helpers.js';
import type { Deferred } from '../helpers.js';

const ADMIN: Principal = { username: 'root', role: 'admin' };
const OPERATOR: Principal = { username: 'alice', role: 'operator' };
const VIEWER: Principal = { username: 'bob', role: 'viewer' };

interface SentCall {
  command: Command;
  reply: Deferred<TransportResult>;
}

/** Transport that holds each call open until the test answers it. */
class ManualTransport implements CommandTransport {
  readonly calls: SentCall[] = [];

  send(_spoke: Spoke, command: Command, signal: AbortSignal): Promise<TransportResult> {
    const reply = deferred<TransportResult>();
    signal.addEventListener('abort', () => reply.reject(signal.reason));
    this.calls.push({ command, reply });
    return reply.promise;
  }

  sentIds(): string[] {
    return this.calls.map((c) => c.command.command_id);
  }
}

interface Harness {
  registry: FleetRegistry;
  store: InMemoryCommandStore;
  transport: ManualTransport;
  dispatcher: CommandDispatcher;
  spokeId: string;
}

async function setup(
  overrides: Partial<ConstructorParameters<typeof CommandDispatcher>[0]> = {},
  status: 'online' | 'pending' | 'degraded' = 'online',
): Promise<Harness> {
  const registry = makeRegistry();
  const { spoke } = await registry.register({ name: 's1', address: '10.0.0.5', api_key: TEST_API_KEY });
  if (status !== 'pending') await registry.updateStatus(spoke.id, 'online');
  if (status === 'degraded') await registry.updateStatus(spoke.id, 'degraded');

  const store = new InMemoryCommandStore();
  const transport = new ManualTransport();
  const dispatcher = new CommandDispatcher({
    registry,
    store,
    transport,
    log: fakeLogger(),
    ackTimeoutMs: 5_000,
    completionTimeoutMs: 60_000,
    allowDegradedDispatch: true,
    ...overrides,
  });
  return { registry, store, transport, dispatcher, spokeId: spoke.id };
}

describe('CommandDispatcher', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  describe('dispatch', () => {
    it('sends the first command right away', async () => {
      const h = await setup();
      const command = await h.dispatcher.dispatch({
        spokeId: h.spokeId,
        verb: 'restart',
        targetInstance: 'survival-1',
        issuer: OPERATOR,
      });

      expect(command).toMatchObject({ state: 'sent', action: 'restart', issued_by: 'alice', target_instance: 'survival-1' });
      expect(h.transport.sentIds()).toEqual([command.command_id]);
      await expect(h.store.findById(command.command_id)).resolves.toMatchObject({ state: 'sent' });
    });

    it('never sends a second command before the first leaves sent', async () => {
      const h = await setup();
      const a = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'stop', targetInstance: 'a', issuer: OPERATOR });
      const b = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: OPERATOR });

      expect(b.state).toBe('queued');
      await flush();
      expect(h.transport.sentIds()).toEqual([a.command_id]);

      h.transport.calls[0]?.reply.resolve({ ok: true });
      await flush();

      expect(h.transport.sentIds()).toEqual([a.command_id, b.command_id]);
      await expect(h.dispatcher.get(a.command_id)).resolves.toMatchObject({ state: 'acknowledged' });
      await expect(h.dispatcher.get(b.command_id)).resolves.toMatchObject({ state: 'sent' });
    });

    it('refuses an offline or pending spoke without creating a command', async () => {
      const h = await setup({}, 'pending');
      await expect(
        h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN }),
      ).rejects.toMatchObject({ kind: 'SpokeUnreachable', message: 'Spoke s1 is pending' });
      await expect(h.store.listBySpoke(h.spokeId, 10)).resolves.toEqual([]);
    });

    it('refuses a degraded spoke when degraded dispatch is off', async () => {
      const h = await setup({ allowDegradedDispatch: false }, 'degraded');
      await expect(
        h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN }),
      ).rejects.toMatchObject({ kind: 'SpokeUnreachable', message: 'Spoke s1 is degraded' });
    });

    it('accepts a degraded spoke by default', async () => {
      const h = await setup({}, 'degraded');
      await expect(
        h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN }),
      ).resolves.toMatchObject({ state: 'sent' });
    });

    it('enforces the verb policy per role', async () => {
      const h = await setup();
      await expect(
        h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: VIEWER }),
      ).rejects.toMatchObject({ kind: 'Unauthorized', message: 'Role viewer may not issue start' });
      await expect(
        h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'update', targetInstance: 'a', issuer: OPERATOR }),
      ).rejects.toMatchObject({ kind: 'Unauthorized' });
    });

    it('throws NotFound for an unknown spoke', async () => {
      const h = await setup();
      await expect(
        h.dispatcher.dispatch({ spokeId: 'missing', verb: 'start', targetInstance: 'a', issuer: ADMIN }),
      ).rejects.toMatchObject({ kind: 'NotFound' });
    });

    it('validates instance names and actions', async () => {
      const h = await setup();
      await expect(
        h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: '../etc', issuer: ADMIN }),
      ).rejects.toMatchObject({ kind: 'ValidationError', message: 'Invalid instance name: ../etc' });
      await expect(
        h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', action: 'backup', issuer: ADMIN }),
      ).rejects.toMatchObject({ message: 'Action is only accepted for custom commands' });
      await expect(
        h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'custom', targetInstance: 'a', issuer: ADMIN }),
      ).rejects.toMatchObject({ kind: 'ValidationError' });
    });

    it('carries the action of a custom command', async () => {
      const h = await setup();
      const command = await h.dispatcher.dispatch({
        spokeId: h.spokeId,
        verb: 'custom',
        targetInstance: 'a',
        action: 'backup',
        issuer: ADMIN,
      });
      expect(command.action).toBe('backup');
    });

    it('surfaces a store failure as InternalFault', async () => {
      const h = await setup();
      vi.spyOn(h.store, 'insert').mockRejectedValueOnce(new Error('db down'));
      await expect(
        h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN }),
      ).rejects.toMatchObject({ kind: 'InternalFault' });
      expect(h.transport.calls).toHaveLength(0);
    });
  });

  describe('transmission outcomes', () => {
    it('marks a rejected command failed with the spoke detail', async () => {
      const h = await setup();
      const command = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });
      h.transport.calls[0]?.reply.resolve({ ok: false, detail: 'HTTP 404: Unknown instance' });
      await flush();

      await expect(h.dispatcher.get(command.command_id)).resolves.toMatchObject({
        state: 'failed',
        result_detail: 'HTTP 404: Unknown instance',
      });
    });

    it('times out a command that is never acknowledged', async () => {
      const h = await setup({ ackTimeoutMs: 10 });
      const command = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });

      await vi.waitFor(async () => {
        await expect(h.dispatcher.get(command.command_id)).resolves.toMatchObject({
          state: 'timed_out',
          result_detail: 'no acknowledgement within 10ms',
        });
      });
      expect(h.dispatcher.openCount).toBe(0);
    });

    it('times out an acknowledged command with no completion report', async () => {
      const h = await setup({ completionTimeoutMs: 10 });
      const command = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });
      h.transport.calls[0]?.reply.resolve({ ok: true });

      await vi.waitFor(async () => {
        await expect(h.dispatcher.get(command.command_id)).resolves.toMatchObject({
          state: 'timed_out',
          result_detail: 'no completion report received',
        });
      });
    });
  });

  describe('reportResult', () => {
    it('moves an acknowledged command to its final state', async () => {
      const h = await setup();
      const command = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });
      h.transport.calls[0]?.reply.resolve({ ok: true });
      await flush();

      const final = await h.dispatcher.reportResult(h.spokeId, command.command_id, { succeeded: true, detail: 'started' });
      expect(final).toMatchObject({ state: 'succeeded', result_detail: 'started' });
    });

    it('accepts a report that overtakes the acknowledgement', async () => {
      const h = await setup();
      const command = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });

      const final = await h.dispatcher.reportResult(h.spokeId, command.command_id, { succeeded: false, detail: 'exit 1' });
      expect(final.state).toBe('failed');

      h.transport.calls[0]?.reply.resolve({ ok: true });
      await flush();
      await expect(h.store.findById(command.command_id)).resolves.toMatchObject({ state: 'failed', result_detail: 'exit 1' });
    });

    it('never moves a terminal command again', async () => {
      const h = await setup();
      const command = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });
      await h.dispatcher.reportResult(h.spokeId, command.command_id, { succeeded: true });

      await expect(
        h.dispatcher.reportResult(h.spokeId, command.command_id, { succeeded: false }),
      ).rejects.toMatchObject({ kind: 'Conflict', message: `Command ${command.command_id} is already succeeded` });
    });

    it('refuses a report for a queued command', async () => {
      const h = await setup();
      await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });
      const queued = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'stop', targetInstance: 'a', issuer: ADMIN });

      await expect(
        h.dispatcher.reportResult(h.spokeId, queued.command_id, { succeeded: true }),
      ).rejects.toMatchObject({ kind: 'Conflict', message: `Command ${queued.command_id} has not been sent yet` });
    });

    it('hides commands of other spokes', async () => {
      const h = await setup();
      const command = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });
      await expect(
        h.dispatcher.reportResult('other-spoke', command.command_id, { succeeded: true }),
      ).rejects.toMatchObject({ kind: 'NotFound' });
    });
  });

  describe('cancelForSpoke', () => {
    it('fails every open command with spoke removed', async () => {
      const h = await setup();
      const a = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });
      const b = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'stop', targetInstance: 'a', issuer: ADMIN });

      await expect(h.dispatcher.cancelForSpoke(h.spokeId)).resolves.toBe(2);
      await flush();

      for (const id of [a.command_id, b.command_id]) {
        await expect(h.store.findById(id)).resolves.toMatchObject({ state: 'failed', result_detail: 'spoke removed' });
      }
      expect(h.transport.calls).toHaveLength(1);
      expect(h.dispatcher.openCount).toBe(0);
    });
  });

  describe('lane failures', () => {
    it('fails the rest of the lane when a queued command cannot be marked sent', async () => {
      const h = await setup();
      const a = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });
      const b = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'stop', targetInstance: 'a', issuer: ADMIN });
      const c = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'restart', targetInstance: 'a', issuer: ADMIN });

      const update = h.store.update.bind(h.store);
      vi.spyOn(h.store, 'update').mockImplementation(async (change) => {
        if (change.state === 'sent') throw new Error('db down');
        await update(change);
      });
      h.transport.calls[0]?.reply.resolve({ ok: true });

      await vi.waitFor(async () => {
        await expect(h.store.findById(c.command_id)).resolves.toMatchObject({
          state: 'failed',
          result_detail: 'hub could not record the command as sent',
        });
      });
      await expect(h.store.findById(b.command_id)).resolves.toMatchObject({
        state: 'failed',
        result_detail: 'hub could not record the command as sent',
      });
      expect(h.transport.sentIds()).toEqual([a.command_id]);

      const d = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });
      expect(d.state).toBe('sent');
      expect(h.transport.sentIds()).toEqual([a.command_id, d.command_id]);
      h.dispatcher.stop();
    });
  });

  describe('recover', () => {
    function storedCommand(spokeId: string, id: string, state: Command['state'], updatedAt: string): Command {
      return {
        command_id: id,
        spoke_id: spokeId,
        verb: 'restart',
        action: 'restart',
        target_instance: 'a',
        issued_by: 'root',
        issued_at: updatedAt,
        updated_at: updatedAt,
        state,
        result_detail: null,
      };
    }

    it('settles the commands a previous process left open', async () => {
      const h = await setup();
      const now = new Date().toISOString();
      await h.store.insert(storedCommand(h.spokeId, 'cmd-queued', 'queued', now));
      await h.store.insert(storedCommand(h.spokeId, 'cmd-sent', 'sent', now));
      await h.store.insert(storedCommand(h.spokeId, 'cmd-done', 'succeeded', now));
      await h.store.insert(
        storedCommand(h.spokeId, 'cmd-acked', 'acknowledged', new Date(Date.now() - 59_990).toISOString()),
      );

      await expect(h.dispatcher.recover()).resolves.toEqual({ failed: 1, timedOut: 1, resumed: 1 });

      await expect(h.store.findById('cmd-queued')).resolves.toMatchObject({
        state: 'failed',
        result_detail: 'hub restarted before the command was sent',
      });
      await expect(h.store.findById('cmd-sent')).resolves.toMatchObject({
        state: 'timed_out',
        result_detail: 'hub restarted before the spoke acknowledged',
      });
      await expect(h.store.findById('cmd-done')).resolves.toMatchObject({ state: 'succeeded' });
      expect(h.dispatcher.openCount).toBe(1);

      // the completion window counts from the stored acknowledgement
      await vi.waitFor(async () => {
        await expect(h.store.findById('cmd-acked')).resolves.toMatchObject({
          state: 'timed_out',
          result_detail: 'no completion report received',
        });
      });
      expect(h.transport.calls).toHaveLength(0);
    });

    it('still accepts the completion report of a resumed command', async () => {
      const h = await setup();
      await h.store.insert(storedCommand(h.spokeId, 'cmd-acked', 'acknowledged', new Date().toISOString()));
      await h.dispatcher.recover();

      const final = await h.dispatcher.reportResult(h.spokeId, 'cmd-acked', { succeeded: true, detail: 'restarted' });
      expect(final).toMatchObject({ state: 'succeeded', result_detail: 'restarted' });
      expect(h.dispatcher.openCount).toBe(0);
    });

    it('fails open commands of spokes that are gone', async () => {
      const h = await setup();
      await h.store.insert(storedCommand('gone-spoke', 'cmd-orphan', 'acknowledged', new Date().toISOString()));

      await expect(h.dispatcher.recover()).resolves.toEqual({ failed: 1, timedOut: 0, resumed: 0 });
      await expect(h.store.findById('cmd-orphan')).resolves.toMatchObject({ state: 'failed', result_detail: 'spoke removed' });
    });

    it('lets a restarted dispatcher send only once the old command has left sent', async () => {
      const h = await setup({ ackTimeoutMs: 600_000 });
      const a = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'stop', targetInstance: 'a', issuer: ADMIN });

      const transport = new ManualTransport();
      const restarted = new CommandDispatcher({
        registry: h.registry,
        store: h.store,
        transport,
        log: fakeLogger(),
        ackTimeoutMs: 5_000,
        completionTimeoutMs: 60_000,
        allowDegradedDispatch: true,
      });
      await restarted.recover();
      await expect(h.store.findById(a.command_id)).resolves.toMatchObject({ state: 'timed_out' });

      const b = await restarted.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });
      expect(b.state).toBe('sent');
      expect(transport.sentIds()).toEqual([b.command_id]);

      restarted.stop();
      h.dispatcher.stop();
    });

    it('surfaces a failing store as InternalFault', async () => {
      const h = await setup();
      vi.spyOn(h.store, 'listOpen').mockRejectedValueOnce(new Error('db down'));
      await expect(h.dispatcher.recover()).rejects.toMatchObject({ kind: 'InternalFault' });
    });
  });

  it('lists a spoke’s commands newest first', async () => {
    const h = await setup();
    const a = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'start', targetInstance: 'a', issuer: ADMIN });
    const b = await h.dispatcher.dispatch({ spokeId: h.spokeId, verb: 'stop', targetInstance: 'a', issuer: ADMIN });

    const listed = await h.dispatcher.listForSpoke(h.spokeId);
    expect(listed.map((c) => c.command_id)).toEqual([b.command_id, a.command_id]);
    h.dispatcher.stop();
  });
});

import { describe, it, expect, vi, afterEach } from 'vitest';
import { HubReporter } from '../../../src/infrastructure/agent/hub-reporter.js';
import { fakeLogger } from '../../helpers.js';

const OUTCOME = { succeeded: true, exit_code: 0, detail: 'started' };

function makeReporter(log = fakeLogger()) {
  return new HubReporter({
    hubUrl: 'http://hub.internal:49950/',
    spokeId: 'spoke-1',
    apiKey: 'test-api-key-0001',
    timeoutMs: 1000,
    log,
  });
}

describe('HubReporter', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the outcome to the command result route', async () => {
    const fetchMock = vi.fn().mockResolvedValue({ ok: true, status: 200 });
    vi.stubGlobal('fetch', fetchMock);

    await expect(makeReporter().report('cmd-1', OUTCOME)).resolves.toBe(true);
    expect(fetchMock).toHaveBeenCalledWith(
      'http://hub.internal:49950/api/v1/spokes/spoke-1/commands/cmd-1/result',
      expect.objectContaining({
        method: 'POST',
        headers: { 'X-API-KEY': 'test-api-key-0001', 'Content-Type': 'application/json' },
        body: JSON.stringify(OUTCOME),
      }),
    );
  });

  it('returns false when the hub refuses', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: false, status: 409 }));
    const log = fakeLogger();
    await expect(makeReporter(log).report('cmd-1', OUTCOME)).resolves.toBe(false);
    expect(log.warn).toHaveBeenCalledWith({ command_id: 'cmd-1', status: 409 }, 'Hub rejected command result');
  });

  it('returns false when the hub is unreachable', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('ECONNREFUSED')));
    await expect(makeReporter().report('cmd-1', OUTCOME)).resolves.toBe(false);
  });
});

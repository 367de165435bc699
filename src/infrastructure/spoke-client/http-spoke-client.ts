import { z } from 'zod';
import type { Command, Spoke } from '../../domain/index.js';
import type { SpokeProbe, SpokeStatusReport } from '../../application/heartbeat-monitor.js';
import type { CommandTransport, TransportResult } from '../../application/command-dispatcher.js';
import { spokeBaseUrl } from './spoke-url.js';

export const API_KEY_HEADER = 'X-API-KEY';

const statusReportSchema = z.object({
  status: z.string(),
  sessions: z.array(z.string()).default([]),
  metrics: z
    .object({
      cpu_percent: z.number(),
      ram_percent: z.number(),
      disk_percent: z.number(),
    })
    .nullable()
    .default(null),
});

const errorBodySchema = z.object({ message: z.string() }).or(z.object({ error: z.string() }));

/**
 * Hub-side HTTP client for spoke agents. Every call carries the spoke's
 * API key, unsealed per call and never cached.
 */
export class HttpSpokeClient implements SpokeProbe, CommandTransport {
  constructor(private readonly revealKey: (spoke: Spoke) => string) {}

  async probe(spoke: Spoke, signal: AbortSignal): Promise<SpokeStatusReport> {
    const response = await fetch(`${spokeBaseUrl(spoke.address)}/status`, {
      headers: { [API_KEY_HEADER]: this.revealKey(spoke) },
      signal,
    });
    if (!response.ok) {
      throw new Error(`spoke answered /status with HTTP ${response.status}`);
    }

    const parsed = statusReportSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('spoke sent a malformed status report');
    }
    if (parsed.data.status !== 'online') {
      throw new Error(`spoke reported status ${parsed.data.status}`);
    }
    return { sessions: parsed.data.sessions, metrics: parsed.data.metrics };
  }

  async send(spoke: Spoke, command: Command, signal: AbortSignal): Promise<TransportResult> {
    const path = `/command/${encodeURIComponent(command.target_instance)}/${encodeURIComponent(command.verb)}`;
    const response = await fetch(`${spokeBaseUrl(spoke.address)}${path}`, {
      method: 'POST',
      headers: {
        [API_KEY_HEADER]: this.revealKey(spoke),
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ command_id: command.command_id, action: command.action }),
      signal,
    });

    if (response.ok) return { ok: true };
    return { ok: false, detail: await describeFailure(response) };
  }
}

async function describeFailure(response: Response): Promise<string> {
  const prefix = `HTTP ${response.status}`;
  try {
    const parsed = errorBodySchema.safeParse(await response.json());
    if (!parsed.success) return prefix;
    return `${prefix}: ${'message' in parsed.data ? parsed.data.message : parsed.data.error}`;
  } catch {
    return prefix;
  }
}

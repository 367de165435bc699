import type { Logger } from 'pino';
import type { ScriptOutcome } from './script-runner.js';

export interface HubReporterOptions {
  hubUrl: string;
  spokeId: string;
  apiKey: string;
  timeoutMs: number;
  log: Logger;
}

/**
 * Sends command outcomes back to the hub. One attempt; a lost report
 * surfaces on the hub as a completion timeout.
 */
export class HubReporter {
  constructor(private readonly opts: HubReporterOptions) {}

  async report(commandId: string, outcome: ScriptOutcome): Promise<boolean> {
    const base = this.opts.hubUrl.replace(/\/+$/, '');
    const url = `${base}/api/v1/spokes/${this.opts.spokeId}/commands/${commandId}/result`;

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'X-API-KEY': this.opts.apiKey, 'Content-Type': 'application/json' },
        body: JSON.stringify(outcome),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
      if (!response.ok) {
        this.opts.log.warn({ command_id: commandId, status: response.status }, 'Hub rejected command result');
        return false;
      }
      this.opts.log.info({ command_id: commandId, succeeded: outcome.succeeded }, 'Command result reported');
      return true;
    } catch (err: unknown) {
      this.opts.log.warn({ err, command_id: commandId }, 'Failed to report command result');
      return false;
    }
  }
}

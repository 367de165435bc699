import WebSocket from 'ws';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { Spoke } from '../../domain/index.js';
import type {
  LogUpstream,
  LogUpstreamConnector,
  LogUpstreamHandlers,
  LogUpstreamOptions,
} from '../../application/log-relay.js';
import { logStreamPath, spokeWsUrl } from './spoke-url.js';
import { API_KEY_HEADER } from './http-spoke-client.js';

const logFrameSchema = z.object({
  instance: z.string(),
  line: z.string(),
});

/**
 * Opens the agent's `/logs` WebSocket for one spoke. Frames are
 * `{instance, line}` JSON; anything else is logged and dropped.
 */
export class WsLogUpstreamConnector implements LogUpstreamConnector {
  constructor(
    private readonly revealKey: (spoke: Spoke) => string,
    private readonly log: Logger,
    private readonly handshakeTimeoutMs = 5_000,
  ) {}

  open(spoke: Spoke, handlers: LogUpstreamHandlers, options: LogUpstreamOptions): LogUpstream {
    const ws = new WebSocket(spokeWsUrl(spoke.address, logStreamPath(options.replay)), {
      headers: { [API_KEY_HEADER]: this.revealKey(spoke) },
      handshakeTimeout: this.handshakeTimeoutMs,
    });
    let closedByUs = false;
    let lastError: string | null = null;

    ws.on('message', (data: WebSocket.RawData) => {
      let frame: unknown;
      try {
        frame = JSON.parse(data.toString());
      } catch {
        this.log.warn({ spoke_id: spoke.id }, 'Non-JSON log frame from spoke, dropping');
        return;
      }
      const parsed = logFrameSchema.safeParse(frame);
      if (!parsed.success) {
        this.log.warn({ spoke_id: spoke.id }, 'Malformed log frame from spoke, dropping');
        return;
      }
      handlers.onLine(parsed.data.instance, parsed.data.line);
    });

    ws.on('error', (err: Error) => {
      lastError = err.message;
      this.log.debug({ err, spoke_id: spoke.id }, 'Log upstream error');
    });

    ws.on('close', (code: number, reason: Buffer) => {
      if (closedByUs) return;
      const text = reason.toString() || lastError || `code ${code}`;
      handlers.onClose(text);
    });

    return {
      close: () => {
        closedByUs = true;
        ws.close(1000, 'no subscribers');
      },
    };
  }
}

import type { IncomingMessage, Server as HttpServer } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocket, WebSocketServer as WsServer } from 'ws';
import type { Logger } from 'pino';
import { isControlPlaneError } from '../../domain/index.js';
import type { TailHandle, LineHandler } from '../../infrastructure/agent/index.js';
import { headerValue } from '../http/auth-hooks.js';
import { authenticateHub } from './agent-routes.js';
import type { AgentContext } from './agent-routes.js';

/** Frames are dropped while the hub has this much unsent data queued. */
const MAX_BUFFERED_BYTES = 1024 * 1024;

export interface LogSource {
  /**
   * Starts following every known instance's console log, first sending
   * its recent lines when `replay` is set.
   */
  follow(onLine: LineHandler, options: { replay: boolean }): Promise<TailHandle>;
}

/**
 * Agent side of the log stream: `/logs` WebSocket, hub key required.
 * Sends `{instance, line}` frames for every instance's console log.
 * `?replay=0` skips the recent lines, for hubs that reconnect.
 */
export class LogStreamServer {
  private readonly wss = new WsServer({ noServer: true });
  private readonly tails: Set<TailHandle> = new Set();

  constructor(
    private readonly ctx: AgentContext,
    private readonly source: LogSource,
    private readonly log: Logger,
  ) {}

  attach(server: HttpServer): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      void this.handleUpgrade(req, socket, head).catch((err: unknown) => {
        this.log.error({ err }, 'Log stream upgrade failed');
        socket.destroy();
      });
    });
  }

  close(): void {
    for (const tail of this.tails) tail.stop();
    this.tails.clear();
    for (const client of this.wss.clients) client.close(1001, 'agent shutting down');
    this.wss.close();
  }

  private async handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname !== '/logs') {
      socket.destroy();
      return;
    }

    try {
      await authenticateHub(this.ctx, headerValue(req.headers['x-api-key']), req.socket.remoteAddress ?? '');
    } catch (err: unknown) {
      const status = isControlPlaneError(err) ? err.statusCode : 500;
      socket.end(`HTTP/1.1 ${status} Rejected\r\nConnection: close\r\n\r\n`);
      return;
    }

    const replay = url.searchParams.get('replay') !== '0';
    this.wss.handleUpgrade(req, socket, head, (ws) => {
      void this.stream(ws, replay).catch((err: unknown) => {
        this.log.error({ err }, 'Failed to start log stream');
        ws.close(1011, 'log stream failed');
      });
    });
  }

  private async stream(ws: WebSocket, replay: boolean): Promise<void> {
    let dropped = 0;
    let closed = false;
    let tail: TailHandle | null = null;

    ws.on('close', () => {
      closed = true;
      if (tail !== null) {
        tail.stop();
        this.tails.delete(tail);
      }
      this.log.info({ dropped }, 'Hub disconnected from log stream');
    });
    ws.on('error', (err: Error) => {
      this.log.debug({ err }, 'Log stream socket error');
    });

    const started = await this.source.follow((instance, line) => {
      if (ws.readyState !== WebSocket.OPEN) return;
      if (ws.bufferedAmount > MAX_BUFFERED_BYTES) {
        dropped++;
        return;
      }
      ws.send(JSON.stringify({ instance, line }));
    }, { replay });

    if (closed) {
      started.stop();
      return;
    }
    tail = started;
    this.tails.add(started);
    this.log.info({ replay }, 'Hub connected to log stream');
  }
}

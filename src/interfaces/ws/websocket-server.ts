import type { IncomingMessage, Server as HttpServer } from 'node:http';
import type { Duplex } from 'node:stream';
import { randomUUID } from 'node:crypto';
import { WebSocket, WebSocketServer as WsServer } from 'ws';
import { z } from 'zod';
import type { Logger } from 'pino';
import { isControlPlaneError } from '../../domain/index.js';
import type { TransitionEvent } from '../../domain/index.js';
import type {
  AuthGate,
  DashboardSession,
  LogDelivery,
  LogRelay,
  SubscriptionHandle,
} from '../../application/index.js';
import { bearerToken } from '../http/auth-hooks.js';

const PING_INTERVAL_MS = 30_000;

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('subscribe_logs'),
    spoke_id: z.string().uuid(),
    instance: z.string().min(1).max(64).optional(),
  }),
  z.object({
    type: z.literal('unsubscribe_logs'),
    subscription_id: z.string().uuid(),
  }),
]);

interface DashboardClient {
  id: string;
  ws: WebSocket;
  session: DashboardSession;
  alive: boolean;
  closed: boolean;
  subscriptions: Map<string, SubscriptionHandle>;
}

/**
 * Dashboard WebSocket endpoint on `/ws?token=<bearer>`.
 *
 * - broadcasts spoke transitions to every connected client
 * - lets clients subscribe to a spoke's console log through the relay
 * - pings every 30 s and drops clients that miss a pong
 */
export class DashboardSocketServer {
  private readonly clients: Map<string, DashboardClient> = new Map();
  private readonly wss = new WsServer({ noServer: true });
  private pingInterval: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly log: Logger,
    private readonly auth: AuthGate,
    private readonly relay: LogRelay,
  ) {}

  attach(server: HttpServer): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });

    this.pingInterval = setInterval(() => {
      for (const client of this.clients.values()) {
        if (!client.alive) {
          this.gracefulClose(client, 'heartbeat_timeout');
          client.ws.terminate();
          continue;
        }
        client.alive = false;
        client.ws.ping();
      }
    }, PING_INTERVAL_MS);

    this.log.info('Dashboard WebSocket server attached on /ws');
  }

  broadcastTransition(event: TransitionEvent): void {
    const message = JSON.stringify({ type: 'transition', ...event });
    let sent = 0;

    for (const client of this.clients.values()) {
      if (client.ws.readyState !== WebSocket.OPEN) continue;
      client.ws.send(message);
      sent++;
    }

    this.log.info(
      { clientCount: this.clients.size, sent, event_id: event.event_id },
      'Broadcasting spoke transition to clients',
    );
  }

  get clientCount(): number {
    return this.clients.size;
  }

  close(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    for (const client of [...this.clients.values()]) {
      this.gracefulClose(client, 'server_shutdown');
      client.ws.close(1001, 'server shutting down');
    }
    this.wss.close();
  }

  /** Registers an accepted socket. Split out from the upgrade for tests. */
  handleConnection(ws: WebSocket, session: DashboardSession): string {
    const client: DashboardClient = {
      id: randomUUID(),
      ws,
      session,
      alive: true,
      closed: false,
      subscriptions: new Map(),
    };
    this.clients.set(client.id, client);

    ws.on('pong', () => {
      client.alive = true;
    });
    ws.on('message', (data: WebSocket.RawData) => {
      this.handleMessage(client, data.toString());
    });
    ws.on('close', () => this.gracefulClose(client, 'close'));
    ws.on('error', (err: Error) => {
      this.log.debug({ err, clientId: client.id }, 'WebSocket client error');
    });

    this.log.info(
      { clientId: client.id, username: session.principal.username, clientCount: this.clients.size },
      'WebSocket client connected',
    );
    return client.id;
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname !== '/ws') {
      socket.destroy();
      return;
    }

    let session: DashboardSession;
    try {
      const token = url.searchParams.get('token') ?? bearerToken(req.headers.authorization);
      session = this.auth.authenticateDashboard(token);
    } catch (err: unknown) {
      this.log.warn({ err }, 'Rejected WebSocket upgrade');
      socket.end('HTTP/1.1 401 Unauthorized\r\nConnection: close\r\n\r\n');
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.handleConnection(ws, session);
    });
  }

  private handleMessage(client: DashboardClient, raw: string): void {
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      this.reply(client, { type: 'error', error: 'ValidationError', message: 'Messages must be JSON' });
      return;
    }

    const parsed = clientMessageSchema.safeParse(body);
    if (!parsed.success) {
      this.reply(client, { type: 'error', error: 'ValidationError', message: 'Unknown or malformed message' });
      return;
    }

    const message = parsed.data;
    if (message.type === 'unsubscribe_logs') {
      const handle = client.subscriptions.get(message.subscription_id);
      if (handle !== undefined) {
        this.relay.unsubscribe(handle);
        client.subscriptions.delete(message.subscription_id);
      }
      this.reply(client, { type: 'unsubscribed', subscription_id: message.subscription_id });
      return;
    }

    try {
      let handle: SubscriptionHandle | null = null;
      handle = this.relay.subscribe(
        message.spoke_id,
        {
          send: (item: LogDelivery) => this.sendLog(client, handle, item),
          close: (reason: string) => {
            if (handle !== null) client.subscriptions.delete(handle.id);
            this.reply(client, { type: 'log_closed', spoke_id: message.spoke_id, reason });
          },
        },
        { instance: message.instance },
      );
      client.subscriptions.set(handle.id, handle);
      this.reply(client, { type: 'subscribed', subscription_id: handle.id, spoke_id: message.spoke_id });
    } catch (err: unknown) {
      if (isControlPlaneError(err)) {
        this.reply(client, { type: 'error', error: err.kind, message: err.message });
        return;
      }
      this.log.error({ err, clientId: client.id }, 'Log subscription failed');
      this.reply(client, { type: 'error', error: 'InternalFault', message: 'Log subscription failed' });
    }
  }

  /** Resolves once the frame is flushed, so the relay's queue absorbs slow clients. */
  private sendLog(client: DashboardClient, handle: SubscriptionHandle | null, item: LogDelivery): Promise<void> {
    return new Promise((resolve, reject) => {
      if (client.closed || client.ws.readyState !== WebSocket.OPEN) {
        reject(new Error('client disconnected'));
        return;
      }
      client.ws.send(JSON.stringify({ ...item, type: `log_${item.type}`, subscription_id: handle?.id ?? null }), (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private reply(client: DashboardClient, message: Record<string, unknown>): void {
    if (client.ws.readyState === WebSocket.OPEN) {
      client.ws.send(JSON.stringify(message));
    }
  }

  private gracefulClose(client: DashboardClient, reason: string): void {
    if (client.closed) return;
    client.closed = true;
    this.clients.delete(client.id);

    for (const handle of client.subscriptions.values()) {
      this.relay.unsubscribe(handle);
    }
    client.subscriptions.clear();

    this.log.info(
      { clientId: client.id, reason, clientCount: this.clients.size },
      'WebSocket client disconnected',
    );
  }
}

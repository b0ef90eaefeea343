import type { Server as HTTPServer, IncomingMessage } from 'node:http';
import crypto from 'node:crypto';
import WebSocket, { WebSocketServer } from 'ws';
import type { Broadcaster } from '../broadcast/Broadcaster.js';
import type { CommandRouter } from '../command/CommandRouter.js';
import type { RelayEvent } from '../core/EventBus.js';
import { SchemaError } from '../core/errors.js';

interface ClientData {
  id: string;
  credential: string | undefined;
  isAlive: boolean;
  missedPings: number;
}

export interface GatewayOptions {
  path?: string;
  heartbeatIntervalMs?: number;
  maxMissedPings?: number;
}

/** token 不一致時の close コード */
export const CLOSE_UNAUTHORIZED = 4001;

/**
 * `/ws` の常時接続。受信した `{ cmd, params, id? }` を CommandRouter に渡して
 * 同じ接続へ `{ id, ...result }` を返し、イベントは Broadcaster 経由で流す
 */
export class SocketGateway {
  private wss: WebSocketServer | null = null;
  private clients = new Map<WebSocket, ClientData>();
  private heartbeat: NodeJS.Timeout | null = null;
  private readonly path: string;
  private readonly heartbeatIntervalMs: number;
  private readonly maxMissedPings: number;

  constructor(
    private router: CommandRouter,
    private broadcaster: Broadcaster,
    options: GatewayOptions = {},
  ) {
    this.path = options.path ?? '/ws';
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30000;
    this.maxMissedPings = options.maxMissedPings ?? 2;
  }

  attach(server: HTTPServer): void {
    if (this.wss) return;
    this.wss = new WebSocketServer({ server, path: this.path });
    this.wss.on('connection', (ws, request) => this.handleConnection(ws, request));
    this.wss.on('error', (err) => console.error('[SocketGateway] Server error:', err.message));

    this.heartbeat = setInterval(() => this.checkHeartbeat(), this.heartbeatIntervalMs);
    console.log(`[SocketGateway] Listening on ${this.path}`);
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /** 新規接続を止め、既存クライアントを閉じる */
  async close(): Promise<void> {
    if (this.heartbeat) clearInterval(this.heartbeat);
    this.heartbeat = null;

    for (const [ws, client] of this.clients) {
      this.broadcaster.unregister(client.id, 'shutdown');
      ws.close(1001, 'Server shutting down');
    }
    this.clients.clear();

    const wss = this.wss;
    this.wss = null;
    if (!wss) return;
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private handleConnection(ws: WebSocket, request: IncomingMessage): void {
    const token = new URL(request.url ?? '/', 'http://localhost').searchParams.get('token') ?? undefined;
    if (!this.router.checkCredential(token)) {
      console.warn(`[SocketGateway] Rejected connection from ${request.socket.remoteAddress}: bad token`);
      ws.close(CLOSE_UNAUTHORIZED, 'Unauthorized');
      return;
    }

    const client: ClientData = {
      id: `ws:${crypto.randomUUID()}`,
      credential: token,
      isAlive: true,
      missedPings: 0,
    };
    this.clients.set(ws, client);
    console.log(`[SocketGateway] Client ${client.id} connected from ${request.socket.remoteAddress}`);

    this.broadcaster.register({
      id: client.id,
      isOpen: () => ws.readyState === WebSocket.OPEN,
      deliver: (event) => send(ws, toWire(event)),
    });

    ws.on('pong', () => {
      client.isAlive = true;
      client.missedPings = 0;
    });

    ws.on('message', (data) => {
      this.handleMessage(ws, client, data.toString()).catch((err) => {
        console.error(`[SocketGateway] Message from ${client.id} failed:`, err);
      });
    });

    ws.on('close', () => {
      this.clients.delete(ws);
      this.broadcaster.unregister(client.id, 'client disconnected');
    });

    ws.on('error', (err) => {
      console.error(`[SocketGateway] ${client.id} error:`, err.message);
    });
  }

  private async handleMessage(ws: WebSocket, client: ClientData, text: string): Promise<void> {
    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch {
      await send(ws, {
        id: null,
        ok: false,
        command: null,
        error: new SchemaError('Message is not valid JSON').toBody(),
      });
      return;
    }

    const id = requestId(message);
    const result = await this.router.dispatch(message, { subscriberId: client.id, credential: client.credential });
    if (ws.readyState !== WebSocket.OPEN) return;
    await send(ws, { id, ...result });
  }

  private checkHeartbeat(): void {
    for (const [ws, client] of this.clients) {
      if (!client.isAlive) {
        client.missedPings++;
        if (client.missedPings >= this.maxMissedPings) {
          console.log(`[SocketGateway] ${client.id} failed ${client.missedPings} heartbeats, terminating`);
          this.clients.delete(ws);
          this.broadcaster.unregister(client.id, 'heartbeat timeout');
          ws.terminate();
          continue;
        }
      }
      client.isAlive = false;
      ws.ping();
    }
  }
}

export function toWire(event: RelayEvent): { event: string; data: unknown; timestamp: string } {
  return { event: event.name, data: event.data, timestamp: event.timestamp };
}

function requestId(message: unknown): string | number | null {
  if (typeof message !== 'object' || message === null || !('id' in message)) return null;
  const { id } = message;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

function send(ws: WebSocket, payload: unknown): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.send(JSON.stringify(payload), (err) => (err ? reject(err) : resolve()));
  });
}

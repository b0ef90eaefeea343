import crypto from 'node:crypto';
import WebSocket, { WebSocketServer } from 'ws';
import type { UpstreamData } from '../../session/types.js';

export interface FakeResponse {
  ok: boolean;
  code?: number;
  comment?: string;
  data?: UpstreamData;
}

export interface FakeObsOptions {
  password?: string;
  /** Identify に応答しない (ハンドシェイクのタイムアウト確認用) */
  silent?: boolean;
  responses?: Record<string, FakeResponse>;
}

/**
 * テスト用の obs-websocket 互換サーバー (127.0.0.1 のランダムポート)
 */
export class FakeObsServer {
  readonly identifies: UpstreamData[] = [];
  readonly requests: Array<{ requestType: string; requestData: unknown }> = [];
  private clients = new Set<WebSocket>();
  private readonly salt = 'test-salt';
  private readonly challenge = 'test-challenge';

  private constructor(
    private wss: WebSocketServer,
    private options: FakeObsOptions,
  ) {
    wss.on('connection', (ws) => this.handleConnection(ws));
  }

  static async start(options: FakeObsOptions = {}): Promise<FakeObsServer> {
    const wss = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    await new Promise<void>((resolve) => wss.once('listening', () => resolve()));
    return new FakeObsServer(wss, options);
  }

  get port(): number {
    const address = this.wss.address();
    if (address === null || typeof address === 'string') throw new Error('unexpected pipe address');
    return address.port;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  respond(requestType: string, response: FakeResponse): void {
    this.options.responses = { ...this.options.responses, [requestType]: response };
  }

  emit(eventType: string, eventData: UpstreamData = {}): void {
    const message = JSON.stringify({ op: 5, d: { eventType, eventIntent: 1, eventData } });
    for (const ws of this.clients) ws.send(message);
  }

  /** 全クライアントを切断する (配信アプリの終了を模す) */
  dropClients(): void {
    for (const ws of this.clients) ws.close(1001, 'going away');
  }

  async close(): Promise<void> {
    for (const ws of this.clients) ws.terminate();
    this.clients.clear();
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
  }

  private handleConnection(ws: WebSocket): void {
    this.clients.add(ws);
    ws.on('close', () => this.clients.delete(ws));

    const hello: UpstreamData = { obsWebSocketVersion: '5.5.0', rpcVersion: 1 };
    if (this.options.password !== undefined) {
      hello.authentication = { challenge: this.challenge, salt: this.salt };
    }
    ws.send(JSON.stringify({ op: 0, d: hello }));

    ws.on('message', (raw) => {
      const message: unknown = JSON.parse(raw.toString());
      if (!isRecord(message) || !isRecord(message.d)) return;
      const d = message.d;

      if (message.op === 1) {
        this.identifies.push(d);
        if (this.options.silent) return;
        if (this.options.password !== undefined && d.authentication !== this.expectedAuth(this.options.password)) {
          ws.close(4009, 'Authentication failed.');
          return;
        }
        ws.send(JSON.stringify({ op: 2, d: { negotiatedRpcVersion: 1 } }));
        return;
      }

      if (message.op === 6 && typeof d.requestType === 'string') {
        this.requests.push({ requestType: d.requestType, requestData: d.requestData });
        const response = this.options.responses?.[d.requestType] ?? { ok: true };
        ws.send(
          JSON.stringify({
            op: 7,
            d: {
              requestType: d.requestType,
              requestId: d.requestId,
              requestStatus: {
                result: response.ok,
                code: response.code ?? (response.ok ? 100 : 600),
                ...(response.comment === undefined ? {} : { comment: response.comment }),
              },
              ...(response.data === undefined ? {} : { responseData: response.data }),
            },
          }),
        );
      }
    });
  }

  private expectedAuth(password: string): string {
    const secret = crypto.createHash('sha256').update(password + this.salt).digest('base64');
    return crypto.createHash('sha256').update(secret + this.challenge).digest('base64');
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

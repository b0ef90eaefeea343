import crypto from 'node:crypto';
import WebSocket from 'ws';
import { z } from 'zod';
import { UpstreamRequestError, UpstreamUnavailableError } from '../core/errors.js';
import type { TransportHandlers, UpstreamData, UpstreamTransport } from './types.js';

/**
 * obs-websocket 5.x プロトコル
 *
 * - サーバーが Hello (op 0) を送る。パスワード設定時は authentication (challenge, salt) 付き
 * - クライアントが Identify (op 1) で rpcVersion と eventSubscriptions を返す
 * - Identified (op 2) 以降、リクエスト (op 6) とイベント (op 5) が流れる
 * - リクエストへの応答は RequestResponse (op 7)。requestId で対応付ける
 */
const OpCode = {
  Hello: 0,
  Identify: 1,
  Identified: 2,
  Event: 5,
  Request: 6,
  RequestResponse: 7,
} as const;

const RPC_VERSION = 1;

const envelopeSchema = z.object({
  op: z.number().int(),
  d: z.record(z.unknown()),
});

const helloSchema = z.object({
  rpcVersion: z.number().int(),
  authentication: z.object({ challenge: z.string(), salt: z.string() }).optional(),
});

const eventSchema = z.object({
  eventType: z.string(),
  eventData: z.record(z.unknown()).optional(),
});

const responseSchema = z.object({
  requestType: z.string(),
  requestId: z.string(),
  requestStatus: z.object({
    result: z.boolean(),
    code: z.number().int(),
    comment: z.string().optional(),
  }),
  responseData: z.record(z.unknown()).optional(),
});

export interface ObsSocketOptions {
  host: string;
  port: number;
  password: string;
  requestTimeoutMs: number;
}

interface PendingRequest {
  requestType: string;
  resolve: (data: UpstreamData) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export function authenticationString(password: string, salt: string, challenge: string): string {
  const secret = crypto.createHash('sha256').update(password + salt).digest('base64');
  return crypto.createHash('sha256').update(secret + challenge).digest('base64');
}

export class ObsSocket implements UpstreamTransport {
  private ws: WebSocket | null = null;
  private pending = new Map<string, PendingRequest>();
  private identified = false;
  private closing = false;

  constructor(
    private options: ObsSocketOptions,
    private handlers: TransportHandlers,
  ) {}

  get url(): string {
    return `ws://${this.options.host}:${this.options.port}`;
  }

  open(eventSubscriptions: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(this.url, 'obswebsocket.json');
      this.ws = ws;
      let settled = false;

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        ws.terminate();
        reject(err);
      };
      const timer = setTimeout(
        () => fail(new Error(`Handshake timed out after ${this.options.requestTimeoutMs}ms`)),
        this.options.requestTimeoutMs,
      );

      ws.on('message', (raw: WebSocket.RawData) => {
        const parsed = envelopeSchema.safeParse(parseJson(raw.toString()));
        if (!parsed.success) {
          console.warn('[ObsSocket] Ignoring malformed message');
          return;
        }
        const { op, d } = parsed.data;

        switch (op) {
          case OpCode.Hello: {
            const hello = helloSchema.safeParse(d);
            if (!hello.success) {
              fail(new Error('Malformed Hello from upstream'));
              return;
            }
            const identify: UpstreamData = { rpcVersion: RPC_VERSION, eventSubscriptions };
            const auth = hello.data.authentication;
            if (auth) {
              identify.authentication = authenticationString(this.options.password, auth.salt, auth.challenge);
            }
            ws.send(JSON.stringify({ op: OpCode.Identify, d: identify }));
            break;
          }
          case OpCode.Identified:
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            this.identified = true;
            resolve();
            break;
          case OpCode.Event: {
            const event = eventSchema.safeParse(d);
            if (event.success) {
              this.handlers.onEvent(event.data.eventType, event.data.eventData ?? {});
            }
            break;
          }
          case OpCode.RequestResponse:
            this.settleRequest(d);
            break;
          default:
            break;
        }
      });

      ws.on('error', (err: Error) => {
        if (!settled) {
          fail(err);
          return;
        }
        console.warn(`[ObsSocket] Socket error: ${err.message}`);
      });

      ws.on('close', (code: number, reason: Buffer) => {
        const why = reason.toString() || `code ${code}`;
        this.rejectPending(why);
        const wasIdentified = this.identified;
        this.identified = false;
        if (!settled) {
          fail(new Error(`Connection closed during handshake: ${why}`));
          return;
        }
        if (wasIdentified && !this.closing) {
          this.handlers.onClose(why);
        }
      });
    });
  }

  request(requestType: string, requestData?: UpstreamData): Promise<UpstreamData> {
    const ws = this.ws;
    if (!ws || !this.identified || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new UpstreamUnavailableError());
    }

    const requestId = crypto.randomUUID();
    return new Promise<UpstreamData>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new UpstreamUnavailableError(`${requestType} timed out after ${this.options.requestTimeoutMs}ms`));
      }, this.options.requestTimeoutMs);

      this.pending.set(requestId, { requestType, resolve, reject, timer });

      const d: UpstreamData = { requestType, requestId };
      if (requestData) d.requestData = requestData;
      ws.send(JSON.stringify({ op: OpCode.Request, d }), (err) => {
        if (!err) return;
        clearTimeout(timer);
        this.pending.delete(requestId);
        reject(new UpstreamUnavailableError(err.message));
      });
    });
  }

  async close(): Promise<void> {
    this.closing = true;
    const ws = this.ws;
    this.ws = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) return;

    await new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      if (ws.readyState === WebSocket.OPEN) {
        ws.close(1000, 'Relay closing');
      } else {
        ws.terminate();
      }
    });
  }

  private settleRequest(d: Record<string, unknown>): void {
    const parsed = responseSchema.safeParse(d);
    if (!parsed.success) return;
    const response = parsed.data;
    const entry = this.pending.get(response.requestId);
    if (!entry) return;

    this.pending.delete(response.requestId);
    clearTimeout(entry.timer);
    if (response.requestStatus.result) {
      entry.resolve(response.responseData ?? {});
    } else {
      entry.reject(new UpstreamRequestError(entry.requestType, response.requestStatus.code, response.requestStatus.comment));
    }
  }

  private rejectPending(reason: string): void {
    for (const [id, entry] of this.pending) {
      clearTimeout(entry.timer);
      entry.reject(new UpstreamUnavailableError(`Connection closed with ${entry.requestType} pending: ${reason}`));
      this.pending.delete(id);
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

import type { EventBus } from '../core/EventBus.js';
import { UpstreamUnavailableError, errorMessage } from '../core/errors.js';
import { sleep } from '../core/sleep.js';
import {
  STANDING_SUBSCRIPTIONS,
  backoffDelay,
  type BackoffPolicy,
  type SessionState,
  type SessionStatus,
  type TransportFactory,
  type UpstreamData,
  type UpstreamTransport,
} from './types.js';

export interface SupervisorOptions {
  backoff: BackoffPolicy;
  /** 0 = 無制限 */
  maxReconnectAttempts: number;
  eventSubscriptions?: number;
}

/** 配信アプリの終了を示すイベント */
const EXIT_EVENTS = new Set(['ExitStarted']);

/**
 * アップストリームとのセッションを 1 本だけ保持する
 *
 * disconnected → connecting → connected → reconnecting → connecting ...
 * `maxReconnectAttempts` (> 0) 回失敗すると disconnected で止まり、
 * 次に `connect()` が呼ばれるまで再接続しない
 */
export class SessionSupervisor {
  private status: SessionStatus = 'disconnected';
  private attempts = 0;
  private transport: UpstreamTransport | null = null;
  private inFlight: Promise<boolean> | null = null;
  private manualConnect: Promise<boolean> | null = null;
  private reconnectAbort: AbortController | null = null;
  private reconnectTask: Promise<void> | null = null;
  private shuttingDown = false;
  private expectedScene: string | null = null;
  private readonly subscriptions: number;

  constructor(
    private options: SupervisorOptions,
    private bus: EventBus,
    private createTransport: TransportFactory,
  ) {
    this.subscriptions = options.eventSubscriptions ?? STANDING_SUBSCRIPTIONS;
  }

  currentState(): SessionState {
    return { status: this.status, attempts: this.attempts };
  }

  isConnected(): boolean {
    return this.status === 'connected';
  }

  /**
   * 接続できたら true。失敗時はバックオフ付きの再接続ループに引き継いで false
   */
  async connect(): Promise<boolean> {
    if (this.shuttingDown) return false;
    if (this.status === 'connected') return true;
    if (this.manualConnect) return this.manualConnect;
    if (this.inFlight) return this.inFlight;

    // 最初の await より前に登録し、同時に来た呼び出しは同じ接続を待たせる
    this.manualConnect = this.runManualConnect().finally(() => {
      this.manualConnect = null;
    });
    return this.manualConnect;
  }

  /**
   * 自分で切り替えたシーンの CurrentProgramSceneChanged は外部変更として扱わない
   */
  expectScene(scene: string): void {
    this.expectedScene = scene;
  }

  async send(requestType: string, requestData?: UpstreamData): Promise<UpstreamData> {
    const transport = this.transport;
    if (this.status !== 'connected' || !transport) {
      throw new UpstreamUnavailableError(`Cannot send ${requestType}: session is ${this.status}`);
    }
    return transport.request(requestType, requestData);
  }

  /** バックオフ待ちを中断し、再接続ループの終了を待ってから切断 */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    await this.cancelReconnect();
    if (this.manualConnect) await this.manualConnect;
    if (this.inFlight) await this.inFlight;
    const transport = this.transport;
    this.transport = null;
    if (transport) await transport.close();
    if (this.status !== 'disconnected') this.transition('disconnected', 'shutdown');
  }

  private async runManualConnect(): Promise<boolean> {
    // 手動接続はバックオフ待ちを打ち切り、回数も数え直す
    await this.cancelReconnect();
    if (this.shuttingDown) return false;
    this.attempts = 0;

    const connected = await this.attempt();
    if (!connected && !this.shuttingDown) {
      if (this.exhausted()) {
        this.transition('disconnected', 'max reconnect attempts reached');
      } else {
        this.startReconnectLoop();
      }
    }
    return connected;
  }

  private attempt(): Promise<boolean> {
    const run = async (): Promise<boolean> => {
      this.transition('connecting', `attempt ${this.attempts + 1}`);
      const transport = this.createTransport({
        onEvent: (eventType, eventData) => this.handleUpstreamEvent(transport, eventType, eventData),
        onClose: (reason) => this.handleClose(transport, reason),
      });
      this.transport = transport;

      try {
        await transport.open(this.subscriptions);
      } catch (err) {
        this.transport = null;
        this.attempts++;
        console.warn(`[SessionSupervisor] Connection attempt ${this.attempts} failed: ${errorMessage(err)}`);
        if (!this.shuttingDown) this.transition('reconnecting', errorMessage(err));
        return false;
      }

      if (this.shuttingDown) {
        await transport.close();
        this.transport = null;
        return false;
      }
      this.attempts = 0;
      this.transition('connected', 'identified');
      return true;
    };

    this.inFlight = run().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private startReconnectLoop(): void {
    if (this.reconnectTask || this.shuttingDown) return;
    const abort = new AbortController();
    this.reconnectAbort = abort;
    this.reconnectTask = this.reconnectLoop(abort.signal)
      .catch((err) => {
        console.error('[SessionSupervisor] Reconnect loop failed:', err);
      })
      .finally(() => {
        if (this.reconnectAbort === abort) {
          this.reconnectAbort = null;
          this.reconnectTask = null;
        }
      });
  }

  private async reconnectLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const delay = backoffDelay(this.options.backoff, this.attempts + 1);
      console.log(`[SessionSupervisor] Reconnecting in ${delay}ms (attempt ${this.attempts + 1})`);
      if (!(await sleep(delay, signal))) return;

      if (await this.attempt()) return;
      if (signal.aborted) return;
      if (this.exhausted()) {
        console.error(`[SessionSupervisor] Giving up after ${this.attempts} attempts`);
        this.transition('disconnected', 'max reconnect attempts reached');
        return;
      }
    }
  }

  private async cancelReconnect(): Promise<void> {
    const abort = this.reconnectAbort;
    const task = this.reconnectTask;
    this.reconnectAbort = null;
    this.reconnectTask = null;
    if (abort) abort.abort();
    if (task) await task;
  }

  private exhausted(): boolean {
    const max = this.options.maxReconnectAttempts;
    return max > 0 && this.attempts >= max;
  }

  private handleClose(transport: UpstreamTransport, reason: string): void {
    if (transport !== this.transport || this.shuttingDown) return;
    this.transport = null;
    if (this.status !== 'connected') return;

    console.warn(`[SessionSupervisor] Upstream session lost: ${reason}`);
    this.attempts = 0;
    this.transition('reconnecting', reason);
    this.startReconnectLoop();
  }

  private handleUpstreamEvent(transport: UpstreamTransport, eventType: string, eventData: UpstreamData): void {
    if (transport !== this.transport) return;

    if (EXIT_EVENTS.has(eventType)) {
      this.handleClose(transport, eventType);
      transport.close().catch((err) => {
        console.warn(`[SessionSupervisor] Close after ${eventType} failed: ${errorMessage(err)}`);
      });
      return;
    }

    if (eventType === 'MediaInputPlaybackEnded') {
      this.bus.publish({ name: 'media_ended', data: { source: stringField(eventData, 'inputName') } });
    } else if (eventType === 'CurrentProgramSceneChanged') {
      const scene = stringField(eventData, 'sceneName');
      if (scene === this.expectedScene) {
        this.expectedScene = null;
        return;
      }
      this.bus.publish({ name: 'scene_changed_external', data: { scene } });
    }
  }

  private transition(next: SessionStatus, reason: string): void {
    if (this.status === next) return;
    const prev = this.status;
    this.status = next;
    console.log(`[SessionSupervisor] ${prev} → ${next} (${reason})`);
    if (next === 'connected') {
      this.bus.publish({ name: 'session_connected', data: { attempts: this.attempts } });
    } else {
      this.bus.publish({ name: 'session_disconnected', data: { state: next, attempts: this.attempts, reason } });
    }
  }
}

function stringField(data: UpstreamData, key: string): string {
  const value = data[key];
  return typeof value === 'string' ? value : '';
}

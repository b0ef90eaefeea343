export type SessionStatus = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

export interface SessionState {
  status: SessionStatus;
  /** 今回の切断中に失敗した試行回数。`connected` で 0 に戻る */
  attempts: number;
}

export type UpstreamData = Record<string, unknown>;

export interface TransportHandlers {
  /** アップストリームから届いたイベント */
  onEvent(eventType: string, eventData: UpstreamData): void;
  /** 確立済みのセッションが切れた */
  onClose(reason: string): void;
}

/** アップストリームへの接続 1 本。試行ごとに作り直す */
export interface UpstreamTransport {
  open(eventSubscriptions: number): Promise<void>;
  request(requestType: string, requestData?: UpstreamData): Promise<UpstreamData>;
  close(): Promise<void>;
}

export type TransportFactory = (handlers: TransportHandlers) => UpstreamTransport;

export type BackoffKind = 'fixed' | 'exponential';

export interface BackoffPolicy {
  kind: BackoffKind;
  intervalMs: number;
  maxIntervalMs: number;
}

/** `attempt` 回目 (1 始まり) の再接続までの待ち時間 */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  if (policy.kind === 'fixed') return policy.intervalMs;
  const delay = policy.intervalMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(delay, policy.maxIntervalMs);
}

/** obs-websocket のイベント購読ビット */
export const EventSubscription = {
  General: 1 << 0,
  Config: 1 << 1,
  Scenes: 1 << 2,
  Inputs: 1 << 3,
  Transitions: 1 << 4,
  Filters: 1 << 5,
  Outputs: 1 << 6,
  SceneItems: 1 << 7,
  MediaInputs: 1 << 8,
} as const;

export const STANDING_SUBSCRIPTIONS =
  EventSubscription.General | EventSubscription.Scenes | EventSubscription.Outputs | EventSubscription.MediaInputs;

import type { SessionStatus } from '../session/types.js';

export interface TrackEventData {
  playlist: string;
  position: number;
  track: string;
  path: string;
}

/** イベント名 → ペイロード */
export interface RelayEventMap {
  scene_switched: { scene: string };
  scene_changed_external: { scene: string };
  preset_activated: { preset: string; scene: string; playlist: string | null };
  playlist_activated: TrackEventData;
  track_changed: TrackEventData;
  playlist_ended: { playlist: string; position: number };
  stream_started: Record<string, never>;
  stream_stopped: Record<string, never>;
  recording_started: Record<string, never>;
  recording_stopped: { outputPath: string | null };
  session_connected: { attempts: number };
  session_disconnected: { state: SessionStatus; attempts: number; reason: string };
  media_ended: { source: string };
  persistence_warning: { message: string };
  overlay_triggered: { text: string; holdMs: number; delayMs: number };
  overlay_hidden: { reason: 'timeout' | 'manual' };
}

export type RelayEventName = keyof RelayEventMap;

export type RelayEventInput = {
  [N in RelayEventName]: { name: N; data: RelayEventMap[N] };
}[RelayEventName];

export type RelayEvent = RelayEventInput & { timestamp: string };

export type EventListener = (event: RelayEvent) => void;

/**
 * プロセス内の publish / subscribe
 *
 * リスナーは登録順に同期で呼ばれる (全リスナーが発行順にイベントを受け取る)。
 * 例外を投げたリスナーはログに残して次へ進む
 */
export class EventBus {
  private listeners: EventListener[] = [];

  subscribe(listener: EventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  publish(input: RelayEventInput): RelayEvent {
    const event: RelayEvent = { ...input, timestamp: new Date().toISOString() };
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (err) {
        console.error(`[EventBus] Listener failed on "${event.name}":`, err);
      }
    }
    return event;
  }

  listenerCount(): number {
    return this.listeners.length;
  }

  clear(): void {
    this.listeners = [];
  }
}

import type { EventBus, TrackEventData } from '../core/EventBus.js';
import { NoActivePlaylistError, ShuttingDownError, UpstreamRequestError, errorMessage } from '../core/errors.js';
import { sleep } from '../core/sleep.js';
import type { PlaylistLibrary } from '../playlist/PlaylistLibrary.js';
import type { PlaylistScheduler } from '../playlist/PlaylistScheduler.js';
import type { Track } from '../playlist/types.js';
import { RESOURCE_NOT_FOUND, type StudioController } from '../session/StudioController.js';

export interface OverlayConfig {
  enabled: boolean;
  /** 文字列を差し替えるテキストソース */
  sourceName: string;
  /** ソースを含むシーン。空なら現在のプログラムシーン */
  sceneName: string;
  holdMs: number;
  delayMs: number;
  prefix: string;
  suffix: string;
  /** トラックが変わるたびに自動で表示する */
  autoTrigger: boolean;
}

export interface OverlayTiming {
  holdMs?: number;
  delayMs?: number;
}

export interface OverlayTriggerResult {
  text: string;
  holdMs: number;
  delayMs: number;
  source: string;
}

export interface OverlayStatus {
  /** 表示待ちまたは表示中 */
  active: boolean;
  visible: boolean;
  text: string;
  track: { title: string; playlist: string; position: number } | null;
  remainingMs: number;
  config: OverlayConfig;
}

interface Sequence {
  text: string;
  abort: AbortController;
  visible: boolean;
  hideAt: number | null;
  done: Promise<void>;
}

/**
 * トラック切替時のタイトル表示
 *
 * delay → 文字列を設定して表示 → hold → 非表示、を 1 つのシーケンスとして持つ。
 * 新しい表示要求は実行中のシーケンスを中断し、表示中なら隠してから始める
 */
export class OverlayManager {
  private current: Sequence | null = null;
  private lastTrack: OverlayStatus['track'] = null;
  private tail: Promise<void> = Promise.resolve();
  private closed = false;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private studio: StudioController,
    private library: PlaylistLibrary,
    private scheduler: PlaylistScheduler,
    private bus: EventBus,
    private config: OverlayConfig,
  ) {}

  /** playlist_activated / track_changed を購読する */
  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.subscribe((event) => {
      if (event.name !== 'playlist_activated' && event.name !== 'track_changed') return;
      this.trackChanged(event.data).catch((err) => {
        console.error(`[Overlay] Auto-trigger failed: ${errorMessage(err)}`);
      });
    });
    console.log(`[Overlay] Auto-trigger registered → source: "${this.config.sourceName}"`);
  }

  /** 購読をやめ、実行中のシーケンスを止めて表示を消す */
  async stop(): Promise<void> {
    this.closed = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.tail;
    await this.cancel();
  }

  trigger(text: string, timing: OverlayTiming = {}): Promise<OverlayTriggerResult> {
    return this.serialize(async () => {
      const holdMs = timing.holdMs ?? this.config.holdMs;
      const delayMs = timing.delayMs ?? this.config.delayMs;

      await this.cancel();
      this.begin(text, holdMs, delayMs);
      console.log(`[Overlay] Triggered "${text}" hold=${holdMs}ms delay=${delayMs}ms`);
      this.bus.publish({ name: 'overlay_triggered', data: { text, holdMs, delayMs } });
      return { text, holdMs, delayMs, source: this.config.sourceName };
    });
  }

  /** 現在のトラックで表示し直す。待ち時間なし、skip 指定も無視する */
  triggerCurrent(): Promise<OverlayTriggerResult> {
    const { activePlaylist, position, currentTrack } = this.scheduler.status();
    if (activePlaylist === null || !currentTrack) return Promise.reject(new NoActivePlaylistError());

    this.lastTrack = { title: currentTrack.title, playlist: activePlaylist, position };
    return this.trigger(this.textFor(currentTrack), { holdMs: currentTrack.overlay?.holdMs, delayMs: 0 });
  }

  /** 実行中のシーケンスを止めて非表示にする。ソースが見つからない・未接続ならエラー */
  hide(): Promise<{ hidden: true; source: string }> {
    return this.serialize(async () => {
      const sequence = this.current;
      if (sequence) {
        sequence.abort.abort();
        await sequence.done;
      }
      await this.setVisible(false);
      if (sequence) {
        sequence.visible = false;
        this.bus.publish({ name: 'overlay_hidden', data: { reason: 'manual' } });
      }
      console.log('[Overlay] Hidden');
      return { hidden: true, source: this.config.sourceName };
    });
  }

  configuration(): OverlayConfig {
    return { ...this.config };
  }

  updateConfig(patch: Partial<OverlayConfig>): OverlayConfig {
    const { config } = this;
    this.config = {
      enabled: patch.enabled ?? config.enabled,
      sourceName: patch.sourceName ?? config.sourceName,
      sceneName: patch.sceneName ?? config.sceneName,
      holdMs: patch.holdMs ?? config.holdMs,
      delayMs: patch.delayMs ?? config.delayMs,
      prefix: patch.prefix ?? config.prefix,
      suffix: patch.suffix ?? config.suffix,
      autoTrigger: patch.autoTrigger ?? config.autoTrigger,
    };
    const changed = Object.entries(patch)
      .filter(([, value]) => value !== undefined)
      .map(([key]) => key);
    console.log(`[Overlay] Config updated: ${changed.join(', ') || '(no changes)'}`);
    return this.configuration();
  }

  status(): OverlayStatus {
    const sequence = this.current;
    return {
      active: sequence !== null,
      visible: sequence?.visible ?? false,
      text: sequence?.text ?? '',
      track: this.lastTrack,
      remainingMs: sequence?.hideAt ? Math.max(0, sequence.hideAt - Date.now()) : 0,
      config: this.configuration(),
    };
  }

  private async trackChanged(data: TrackEventData): Promise<void> {
    if (!this.config.enabled || !this.config.autoTrigger || this.closed) return;

    const track = this.library.get(data.playlist)?.tracks[data.position];
    if (!track) return;
    if (track.overlay?.skip) {
      console.log(`[Overlay] Skipped for track: ${track.title}`);
      return;
    }

    this.lastTrack = { title: track.title, playlist: data.playlist, position: data.position };
    await this.trigger(this.textFor(track), { holdMs: track.overlay?.holdMs, delayMs: track.overlay?.delayMs });
  }

  private textFor(track: Track): string {
    return track.overlay?.text || `${this.config.prefix}${track.title}${this.config.suffix}`;
  }

  private begin(text: string, holdMs: number, delayMs: number): void {
    const sequence: Sequence = {
      text,
      abort: new AbortController(),
      visible: false,
      hideAt: null,
      done: Promise.resolve(),
    };
    this.current = sequence;
    sequence.done = this.run(sequence, holdMs, delayMs).finally(() => {
      if (this.current === sequence) this.current = null;
    });
  }

  private async run(sequence: Sequence, holdMs: number, delayMs: number): Promise<void> {
    const { signal } = sequence.abort;
    if (delayMs > 0 && !(await sleep(delayMs, signal))) return;
    if (signal.aborted) return;

    try {
      await this.studio.setText(this.config.sourceName, sequence.text);
      await this.setVisible(true);
    } catch (err) {
      console.warn(`[Overlay] Could not show "${sequence.text}": ${errorMessage(err)}`);
      return;
    }
    sequence.visible = true;
    sequence.hideAt = Date.now() + holdMs;

    // 中断された場合は中断した側が隠す
    if (!(await sleep(holdMs, signal))) return;
    try {
      await this.setVisible(false);
    } catch (err) {
      console.warn(`[Overlay] Could not hide "${sequence.text}": ${errorMessage(err)}`);
      return;
    }
    sequence.visible = false;
    this.bus.publish({ name: 'overlay_hidden', data: { reason: 'timeout' } });
  }

  /** 実行中のシーケンスを止め、表示中だった場合は隠す */
  private async cancel(): Promise<void> {
    const sequence = this.current;
    if (!sequence) return;
    sequence.abort.abort();
    await sequence.done;
    if (!sequence.visible) return;
    try {
      await this.setVisible(false);
      sequence.visible = false;
    } catch (err) {
      console.warn(`[Overlay] Could not hide "${sequence.text}": ${errorMessage(err)}`);
    }
  }

  private async setVisible(visible: boolean): Promise<void> {
    const scene = this.config.sceneName || (await this.studio.currentScene());
    if (!scene) {
      throw new UpstreamRequestError('GetCurrentProgramScene', RESOURCE_NOT_FOUND, 'no program scene');
    }
    await this.studio.setSourceVisible(scene, this.config.sourceName, visible);
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    if (this.closed) return Promise.reject(new ShuttingDownError());
    const run = this.tail.then(operation);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

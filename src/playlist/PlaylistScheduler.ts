import type { EventBus } from '../core/EventBus.js';
import {
  NoActivePlaylistError,
  NotFoundError,
  OutOfRangeError,
  ShuttingDownError,
  UnvalidatedError,
  errorMessage,
} from '../core/errors.js';
import type { PlaylistLibrary } from './PlaylistLibrary.js';
import type { PlaylistStateStore } from './StateStore.js';
import { defaultPlaylistState, type Playlist, type PlaylistState, type Track } from './types.js';

export type PreflightPolicy = 'off' | 'warn' | 'enforce';

export interface TrackLoader {
  loadTrack(track: Track): Promise<void>;
}

export interface SchedulerOptions {
  /** この名前のメディアソースの再生終了だけを自動送りのトリガーにする */
  sourceName: string;
  autoAdvance: boolean;
  preflight: PreflightPolicy;
}

export interface PlaylistStatus {
  activePlaylist: string | null;
  position: number;
  totalTracks: number;
  loop: boolean;
  autoAdvance: boolean;
  updatedAt: string;
  currentTrack: Track | null;
}

export interface SchedulerResult {
  status: PlaylistStatus;
  /** commit に失敗した場合のみ。メモリ上の状態はそのまま有効 */
  warning?: string;
}

/**
 * プレイリストの再生位置を管理するステートマシン。
 *
 * 手動操作もメディア終了通知による自動送りも、すべて 1 本のキューで順番に処理する。
 * 1 つの操作は「アップストリームへロード → 状態更新 → commit → イベント発行」を
 * 他の操作と交差せずに完了する。
 */
export class PlaylistScheduler {
  private state: PlaylistState;
  private tail: Promise<void> = Promise.resolve();
  private closed = false;
  private resumable: { playlist: string; position: number } | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private library: PlaylistLibrary,
    private store: PlaylistStateStore,
    private loader: TrackLoader,
    private bus: EventBus,
    private options: SchedulerOptions,
  ) {
    this.state = defaultPlaylistState(options.autoAdvance);
  }

  /** 保存済みの状態を読み込み、まだ有効な場合だけ引き継ぐ (アップストリームへのロードはしない) */
  async restore(): Promise<PlaylistState> {
    const stored = await this.store.load();
    const playlist = stored.activePlaylist === null ? null : this.library.get(stored.activePlaylist);

    if (stored.activePlaylist !== null && (!playlist || stored.position >= playlist.tracks.length)) {
      console.warn(
        `[PlaylistScheduler] Saved state "${stored.activePlaylist}" #${stored.position} no longer matches the library, starting fresh`,
      );
      this.state = defaultPlaylistState(this.options.autoAdvance);
    } else {
      this.state = playlist ? stored : { ...stored, position: 0 };
      if (playlist) {
        this.resumable = { playlist: playlist.name, position: stored.position };
        console.log(`[PlaylistScheduler] Restored "${playlist.name}" at position ${stored.position}`);
      }
    }
    return this.snapshot();
  }

  /** media_ended を購読して自動送りを有効にする */
  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.subscribe((event) => {
      if (event.name !== 'media_ended') return;
      this.trackEnded(event.data.source).catch((err) => {
        console.error(`[PlaylistScheduler] Auto-advance failed: ${errorMessage(err)}`);
      });
    });
  }

  /** 新しい操作を受け付けず、キューに残っている操作 (と commit) の完了を待つ */
  async close(): Promise<void> {
    this.closed = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.tail;
  }

  snapshot(): PlaylistState {
    return { ...this.state };
  }

  status(): PlaylistStatus {
    const playlist = this.activePlaylist();
    return {
      activePlaylist: this.state.activePlaylist,
      position: this.state.position,
      totalTracks: playlist ? playlist.tracks.length : 0,
      loop: playlist ? playlist.loop : false,
      autoAdvance: this.state.autoAdvance,
      updatedAt: this.state.updatedAt,
      currentTrack: playlist?.tracks[this.state.position] ?? null,
    };
  }

  activate(name: string): Promise<SchedulerResult> {
    return this.serialize(async () => {
      const playlist = this.library.get(name);
      if (!playlist) throw new NotFoundError(`Playlist "${name}" not found`);
      if (playlist.tracks.length === 0) throw new OutOfRangeError(`Playlist "${name}" has no tracks`);
      this.checkPreflight(playlist);

      const position = this.resumable?.playlist === name ? this.resumable.position : 0;
      return this.moveTo(playlist, position, 'playlist_activated');
    });
  }

  next(): Promise<SchedulerResult> {
    return this.serialize(() => this.advance());
  }

  prev(): Promise<SchedulerResult> {
    return this.serialize(async () => {
      const playlist = this.requireActive();
      const candidate = this.state.position - 1;
      if (candidate >= 0) return this.moveTo(playlist, candidate, 'track_changed');
      if (playlist.loop) return this.moveTo(playlist, playlist.tracks.length - 1, 'track_changed');
      // ループなしの先頭では 0 に留まる
      return this.result();
    });
  }

  seek(position: number): Promise<SchedulerResult> {
    return this.serialize(async () => {
      const playlist = this.requireActive();
      if (!Number.isInteger(position) || position < 0 || position >= playlist.tracks.length) {
        throw new OutOfRangeError(`Position ${position} is outside 0..${playlist.tracks.length - 1}`);
      }
      return this.moveTo(playlist, position, 'track_changed');
    });
  }

  /** 次のメディア終了通知から有効。再生には触れない */
  setAutoAdvance(enabled: boolean): Promise<SchedulerResult> {
    return this.serialize(async () => {
      this.state = { ...this.state, autoAdvance: enabled, updatedAt: new Date().toISOString() };
      console.log(`[PlaylistScheduler] Auto-advance ${enabled ? 'enabled' : 'disabled'}`);
      return this.result(await this.persist());
    });
  }

  /** アップストリームのメディア終了通知。自動送りが有効なら next() と同じ */
  trackEnded(source: string): Promise<SchedulerResult> {
    return this.serialize(async () => {
      if (source !== this.options.sourceName || !this.state.autoAdvance || this.state.activePlaylist === null) {
        return this.result();
      }
      console.log(`[PlaylistScheduler] "${source}" finished, advancing`);
      return this.advance();
    });
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

  private async advance(): Promise<SchedulerResult> {
    const playlist = this.requireActive();
    const candidate = this.state.position + 1;
    if (candidate < playlist.tracks.length) return this.moveTo(playlist, candidate, 'track_changed');
    if (playlist.loop) return this.moveTo(playlist, 0, 'track_changed');

    console.log(`[PlaylistScheduler] Playlist "${playlist.name}" ended (no loop)`);
    this.bus.publish({ name: 'playlist_ended', data: { playlist: playlist.name, position: this.state.position } });
    return this.result();
  }

  private async moveTo(
    playlist: Playlist,
    position: number,
    eventName: 'playlist_activated' | 'track_changed',
  ): Promise<SchedulerResult> {
    const track = playlist.tracks[position];
    // ロードに失敗した場合は状態を変えずにエラーを返す
    await this.loader.loadTrack(track);

    this.state = {
      ...this.state,
      activePlaylist: playlist.name,
      position,
      updatedAt: new Date().toISOString(),
    };
    this.resumable = null;
    const warning = await this.persist();

    console.log(`[PlaylistScheduler] "${playlist.name}" #${position}: ${track.title}`);
    this.bus.publish({
      name: eventName,
      data: { playlist: playlist.name, position, track: track.title, path: track.path },
    });
    return this.result(warning);
  }

  private async persist(): Promise<string | undefined> {
    try {
      await this.store.commit(this.snapshot());
      return undefined;
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[PlaylistScheduler] State commit failed, keeping in-memory state: ${message}`);
      this.bus.publish({ name: 'persistence_warning', data: { message } });
      return message;
    }
  }

  private checkPreflight(playlist: Playlist): void {
    if (this.options.preflight === 'off') return;
    const missing = this.library.preflightFor(playlist.name);

    let problem: string | null = null;
    if (missing === null) {
      problem = `Playlist "${playlist.name}" has not been validated`;
    } else if (missing.length > 0) {
      problem = `Playlist "${playlist.name}" has ${missing.length} missing file(s)`;
    }
    if (problem === null) return;

    if (this.options.preflight === 'enforce') throw new UnvalidatedError(problem);
    console.warn(`[PlaylistScheduler] ${problem}, activating anyway`);
  }

  private activePlaylist(): Playlist | null {
    if (this.state.activePlaylist === null) return null;
    return this.library.get(this.state.activePlaylist) ?? null;
  }

  private requireActive(): Playlist {
    const playlist = this.activePlaylist();
    if (!playlist) throw new NoActivePlaylistError();
    return playlist;
  }

  private result(warning?: string): SchedulerResult {
    return warning === undefined ? { status: this.status() } : { status: this.status(), warning };
  }
}

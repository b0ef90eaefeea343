import http from 'node:http';
import type { AddressInfo } from 'node:net';
import path from 'node:path';
import { createApiApp } from './app.js';
import { Broadcaster } from './broadcast/Broadcaster.js';
import { CommandRouter } from './command/CommandRouter.js';
import type { Settings } from './config/settings.js';
import { EventBus } from './core/EventBus.js';
import { errorMessage } from './core/errors.js';
import { OscBridge } from './osc/OscBridge.js';
import { OverlayManager } from './overlay/OverlayManager.js';
import { PlaylistLibrary } from './playlist/PlaylistLibrary.js';
import { PlaylistScheduler } from './playlist/PlaylistScheduler.js';
import { StateStore } from './playlist/StateStore.js';
import { PresetManager } from './presets/PresetManager.js';
import { ObsSocket } from './session/ObsSocket.js';
import { SessionSupervisor } from './session/SessionSupervisor.js';
import { StudioController } from './session/StudioController.js';
import type { TransportFactory } from './session/types.js';
import { SocketGateway } from './socket/SocketGateway.js';

export interface RelayOverrides {
  /** テスト用: アップストリーム接続を差し替える */
  createTransport?: TransportFactory;
}

/**
 * 全コンポーネントの組み立てと起動・停止順序
 */
export class Relay {
  readonly bus = new EventBus();
  readonly broadcaster: Broadcaster;
  readonly supervisor: SessionSupervisor;
  readonly studio: StudioController;
  readonly scheduler: PlaylistScheduler;
  readonly presets: PresetManager;
  readonly overlay: OverlayManager;
  readonly router: CommandRouter;
  readonly gateway: SocketGateway;
  readonly osc: OscBridge | null;

  private server: http.Server | null = null;
  private initialPlaylistPending = true;
  private unsubscribe: (() => void) | null = null;

  private constructor(
    private settings: Settings,
    readonly library: PlaylistLibrary,
    overrides: RelayOverrides,
  ) {
    const { obs, playlist, api, osc, broadcast } = settings;

    const createTransport: TransportFactory =
      overrides.createTransport ??
      ((handlers) =>
        new ObsSocket(
          { host: obs.host, port: obs.port, password: obs.password, requestTimeoutMs: obs.requestTimeoutMs },
          handlers,
        ));

    this.broadcaster = new Broadcaster(broadcast.queueSize);
    this.supervisor = new SessionSupervisor(
      {
        backoff: { kind: obs.backoff, intervalMs: obs.reconnectIntervalMs, maxIntervalMs: obs.maxReconnectIntervalMs },
        maxReconnectAttempts: obs.maxReconnectAttempts,
      },
      this.bus,
      createTransport,
    );
    this.studio = new StudioController(this.supervisor, this.bus, playlist.sourceName);
    this.scheduler = new PlaylistScheduler(
      library,
      new StateStore(path.resolve(playlist.stateFile), playlist.autoAdvance),
      this.studio,
      this.bus,
      { sourceName: playlist.sourceName, autoAdvance: playlist.autoAdvance, preflight: playlist.preflight },
    );
    this.presets = new PresetManager(this.supervisor, this.studio, this.scheduler, this.bus, settings.presets);
    this.overlay = new OverlayManager(this.studio, library, this.scheduler, this.bus, settings.overlay);
    this.router = new CommandRouter(
      {
        supervisor: this.supervisor,
        studio: this.studio,
        scheduler: this.scheduler,
        presets: this.presets,
        library,
        overlay: this.overlay,
      },
      api.apiKey,
    );
    this.gateway = new SocketGateway(this.router, this.broadcaster);
    this.osc = osc.enabled
      ? new OscBridge(this.router, this.broadcaster, {
          listenHost: osc.listenHost,
          listenPort: osc.listenPort,
          replyHost: osc.replyHost,
          replyPort: osc.replyPort,
          credential: osc.credential,
        })
      : null;
  }

  static async create(settings: Settings, overrides: RelayOverrides = {}): Promise<Relay> {
    const library = await PlaylistLibrary.loadDirectory(path.resolve(settings.playlist.directory), {
      probeDurations: settings.playlist.probeDurations,
      loop: settings.playlist.loop,
    });
    if (library.size === 0) {
      console.warn(`[Relay] No playlists found in ${settings.playlist.directory}`);
    }
    return new Relay(settings, library, overrides);
  }

  /**
   * 起動順: プリフライト → 状態復元 → イベント配信 → API / WebSocket / OSC → アップストリーム接続
   * アップストリームに繋がらなくても起動は続行し、バックオフで再接続を続ける
   */
  async start(): Promise<AddressInfo> {
    const { playlist, api } = this.settings;

    if (playlist.preflight !== 'off') {
      const report = this.library.validate();
      for (const [name, missing] of Object.entries(report)) {
        if (missing.length > 0) {
          console.warn(`[Relay] Playlist "${name}" has ${missing.length} missing file(s): ${missing.join(', ')}`);
        }
      }
    }

    await this.scheduler.restore();
    this.scheduler.start();
    this.overlay.start();
    this.broadcaster.attach(this.bus);
    this.unsubscribe = this.bus.subscribe((event) => {
      if (event.name === 'session_connected') this.loadInitialPlaylist();
    });

    const app = createApiApp({
      router: this.router,
      supervisor: this.supervisor,
      library: this.library,
      scheduler: this.scheduler,
      presets: this.presets,
      overlay: this.overlay,
    });
    const server = http.createServer(app);
    this.server = server;
    this.gateway.attach(server);
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(api.port, api.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    const address = addressOf(server);
    console.log(`[Relay] API running on http://${address.address}:${address.port}`);
    console.log(`[Relay] WebSocket:  ws://${address.address}:${address.port}/ws`);

    if (this.osc) await this.osc.start();

    const connected = await this.supervisor.connect();
    if (!connected) {
      console.warn('[Relay] Upstream not reachable yet, retrying in the background');
    }
    return address;
  }

  /**
   * 停止順: コマンド受付停止 → 各アダプタ停止 → タイトル表示停止 → アップストリーム切断 → キュー排出 → 購読者解除
   */
  async shutdown(): Promise<void> {
    console.log('[Relay] Shutting down...');
    this.router.close();

    await this.gateway.close();
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
    if (this.osc) await this.osc.stop();

    // 表示中のタイトルを消すためアップストリーム切断より先
    await this.overlay.stop();
    await this.supervisor.shutdown();
    await this.scheduler.close();
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.broadcaster.close();
    console.log('[Relay] Stopped');
  }

  /** 初回接続時だけ、復元したプレイリスト (なければ既定のプレイリスト) をロードする */
  private loadInitialPlaylist(): void {
    if (!this.initialPlaylistPending) return;
    this.initialPlaylistPending = false;

    const name = this.scheduler.snapshot().activePlaylist ?? this.settings.playlist.defaultPlaylist;
    if (!name) return;
    this.scheduler
      .activate(name)
      .then(({ status }) => {
        console.log(`[Relay] Loaded "${name}" at position ${status.position}`);
      })
      .catch((err) => {
        console.error(`[Relay] Could not load playlist "${name}": ${errorMessage(err)}`);
      });
  }
}

function addressOf(server: http.Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address;
}

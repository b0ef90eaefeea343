import crypto from 'node:crypto';
import {
  AuthError,
  ShuttingDownError,
  errorMessage,
  isRelayError,
  type ErrorBody,
} from '../core/errors.js';
import type { OverlayManager } from '../overlay/OverlayManager.js';
import type { PlaylistLibrary } from '../playlist/PlaylistLibrary.js';
import type { PlaylistScheduler, PlaylistStatus } from '../playlist/PlaylistScheduler.js';
import type { PresetManager } from '../presets/PresetManager.js';
import type { SessionSupervisor } from '../session/SessionSupervisor.js';
import type { StudioController } from '../session/StudioController.js';
import type { SessionState } from '../session/types.js';
import { commandNameOf, parseCommand, type Command } from './commands.js';

export interface CommandOrigin {
  /** 呼び出し元 (adapter:接続ID) */
  subscriberId: string;
  credential?: string;
}

export type CommandResult =
  | { ok: true; command: string; data: unknown; warning?: string }
  | { ok: false; command: string | null; error: ErrorBody };

export interface RelayStatus {
  session: SessionState;
  healthy: boolean;
  scene: string | null;
  preset: string | null;
  playlist: PlaylistStatus;
}

/** get_status の data かどうか */
export function isRelayStatus(value: unknown): value is RelayStatus {
  if (typeof value !== 'object' || value === null) return false;
  if (!('healthy' in value) || typeof value.healthy !== 'boolean') return false;
  if (!('scene' in value) || (value.scene !== null && typeof value.scene !== 'string')) return false;
  return 'playlist' in value && typeof value.playlist === 'object' && value.playlist !== null;
}

export interface RouterDeps {
  supervisor: SessionSupervisor;
  studio: StudioController;
  scheduler: PlaylistScheduler;
  presets: PresetManager;
  library: PlaylistLibrary;
  overlay: OverlayManager;
}

interface Outcome {
  data: unknown;
  warning?: string;
}

/**
 * すべての操作面 (REST / WebSocket / OSC) からのコマンドの入口。
 * 認証 → スキーマ検証 → 1 コマンド = 1 コア操作 のディスパッチ
 */
export class CommandRouter {
  private closed = false;

  constructor(
    private deps: RouterDeps,
    private accessKey: string | undefined,
  ) {}

  /** アクセスキー未設定の場合はすべて許可 */
  checkCredential(credential: string | undefined): boolean {
    if (!this.accessKey) return true;
    if (credential === undefined) return false;
    const expected = Buffer.from(this.accessKey);
    const given = Buffer.from(credential);
    return expected.length === given.length && crypto.timingSafeEqual(expected, given);
  }

  async dispatch(raw: unknown, origin: CommandOrigin): Promise<CommandResult> {
    const name = commandNameOf(raw);
    if (this.closed) {
      return { ok: false, command: name, error: new ShuttingDownError().toBody() };
    }
    // 認証はスキーマ検証より先。コマンド名が有効かどうかを漏らさない
    if (!this.checkCredential(origin.credential)) {
      console.warn(`[CommandRouter] Rejected unauthenticated command from ${origin.subscriberId}`);
      return { ok: false, command: name, error: new AuthError().toBody() };
    }

    try {
      const command = parseCommand(raw);
      const outcome = await this.execute(command);
      return outcome.warning === undefined
        ? { ok: true, command: command.name, data: outcome.data }
        : { ok: true, command: command.name, data: outcome.data, warning: outcome.warning };
    } catch (err) {
      if (isRelayError(err)) {
        console.warn(`[CommandRouter] ${name ?? '(invalid)'} from ${origin.subscriberId} failed: ${err.code}: ${err.message}`);
        return { ok: false, command: name, error: err.toBody() };
      }
      throw err;
    }
  }

  async status(): Promise<RelayStatus> {
    const { supervisor, studio, presets, scheduler } = this.deps;
    const scene = supervisor.isConnected()
      ? await studio.currentScene().catch((err) => {
          console.warn(`[CommandRouter] Could not read current scene: ${errorMessage(err)}`);
          return null;
        })
      : null;
    return {
      session: supervisor.currentState(),
      healthy: supervisor.isConnected(),
      scene,
      preset: presets.active,
      playlist: scheduler.status(),
    };
  }

  /** 以降のコマンドは ShuttingDown で拒否 */
  close(): void {
    this.closed = true;
  }

  private async execute(command: Command): Promise<Outcome> {
    const { supervisor, studio, scheduler, presets, library, overlay } = this.deps;

    switch (command.name) {
      case 'activate_preset':
        return { data: await presets.activate(command.params.name) };
      case 'switch_scene':
        return { data: await studio.switchScene(command.params.scene_name) };
      case 'playlist_activate':
        return fromScheduler(await scheduler.activate(command.params.name));
      case 'playlist_next':
        return fromScheduler(await scheduler.next());
      case 'playlist_prev':
        return fromScheduler(await scheduler.prev());
      case 'playlist_seek':
        return fromScheduler(await scheduler.seek(command.params.position));
      case 'playlist_validate':
        return { data: library.validate() };
      case 'set_auto_advance':
        return fromScheduler(await scheduler.setAutoAdvance(command.params.enabled));
      case 'stream_start':
        return { data: await studio.startStream() };
      case 'stream_stop':
        return { data: await studio.stopStream() };
      case 'record_start':
        return { data: await studio.startRecording() };
      case 'record_stop':
        return { data: await studio.stopRecording() };
      case 'set_transition':
        return { data: await studio.setTransition(command.params.name, command.params.duration_ms) };
      case 'set_volume':
        return { data: await studio.setVolume(command.params.source_name, command.params.volume_db) };
      case 'set_mute':
        return { data: await studio.setMute(command.params.source_name, command.params.muted) };
      case 'overlay_trigger':
        return {
          data: await overlay.trigger(command.params.text, {
            holdMs: command.params.hold_ms,
            delayMs: command.params.delay_ms,
          }),
        };
      case 'overlay_trigger_current':
        return { data: await overlay.triggerCurrent() };
      case 'overlay_hide':
        return { data: await overlay.hide() };
      case 'overlay_configure': {
        const { params } = command;
        return {
          data: overlay.updateConfig({
            enabled: params.enabled,
            sourceName: params.source_name,
            sceneName: params.scene_name,
            holdMs: params.hold_ms,
            delayMs: params.delay_ms,
            prefix: params.prefix,
            suffix: params.suffix,
            autoTrigger: params.auto_trigger,
          }),
        };
      }
      case 'session_reconnect':
        return { data: { connected: await supervisor.connect(), session: supervisor.currentState() } };
      case 'get_status':
        return { data: await this.status() };
      default:
        return assertNever(command);
    }
  }
}

function fromScheduler(result: { status: PlaylistStatus; warning?: string }): Outcome {
  return result.warning === undefined ? { data: result.status } : { data: result.status, warning: result.warning };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}

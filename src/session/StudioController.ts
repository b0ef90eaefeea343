import type { EventBus } from '../core/EventBus.js';
import { UpstreamRequestError } from '../core/errors.js';
import type { Track } from '../playlist/types.js';
import type { TrackLoader } from '../playlist/PlaylistScheduler.js';
import type { SessionSupervisor } from './SessionSupervisor.js';

/** obs-websocket の ResourceNotFound */
export const RESOURCE_NOT_FOUND = 600;

export type MediaAction = 'play' | 'pause' | 'restart';

const MEDIA_ACTIONS: Record<MediaAction, string> = {
  play: 'OBS_WEBSOCKET_MEDIA_INPUT_ACTION_PLAY',
  pause: 'OBS_WEBSOCKET_MEDIA_INPUT_ACTION_PAUSE',
  restart: 'OBS_WEBSOCKET_MEDIA_INPUT_ACTION_RESTART',
};

/**
 * 配信アプリへの操作をまとめた薄いラッパー。状態を変える呼び出しが成功したらイベントを発行する
 */
export class StudioController implements TrackLoader {
  constructor(
    private supervisor: SessionSupervisor,
    private bus: EventBus,
    private sourceName: string,
  ) {}

  async switchScene(scene: string): Promise<{ scene: string }> {
    this.supervisor.expectScene(scene);
    await this.supervisor.send('SetCurrentProgramScene', { sceneName: scene });
    console.log(`[Studio] Switched to scene: ${scene}`);
    this.bus.publish({ name: 'scene_switched', data: { scene } });
    return { scene };
  }

  async currentScene(): Promise<string | null> {
    const response = await this.supervisor.send('GetCurrentProgramScene');
    const scene = response.currentProgramSceneName ?? response.sceneName;
    return typeof scene === 'string' ? scene : null;
  }

  async setTransition(name?: string, durationMs?: number): Promise<{ transition?: string; durationMs?: number }> {
    const result: { transition?: string; durationMs?: number } = {};
    if (name !== undefined) {
      await this.supervisor.send('SetCurrentSceneTransition', { transitionName: name });
      result.transition = name;
    }
    if (durationMs !== undefined) {
      await this.supervisor.send('SetCurrentSceneTransitionDuration', { transitionDuration: durationMs });
      result.durationMs = durationMs;
    }
    return result;
  }

  async startStream(): Promise<{ streaming: true }> {
    await this.supervisor.send('StartStream');
    this.bus.publish({ name: 'stream_started', data: {} });
    return { streaming: true };
  }

  async stopStream(): Promise<{ streaming: false }> {
    await this.supervisor.send('StopStream');
    this.bus.publish({ name: 'stream_stopped', data: {} });
    return { streaming: false };
  }

  async startRecording(): Promise<{ recording: true }> {
    await this.supervisor.send('StartRecord');
    this.bus.publish({ name: 'recording_started', data: {} });
    return { recording: true };
  }

  async stopRecording(): Promise<{ recording: false; outputPath: string | null }> {
    const response = await this.supervisor.send('StopRecord');
    const outputPath = typeof response.outputPath === 'string' ? response.outputPath : null;
    this.bus.publish({ name: 'recording_stopped', data: { outputPath } });
    return { recording: false, outputPath };
  }

  async setVolume(source: string, volumeDb: number): Promise<{ source: string; volumeDb: number }> {
    await this.supervisor.send('SetInputVolume', { inputName: source, inputVolumeDb: volumeDb });
    return { source, volumeDb };
  }

  async setMute(source: string, muted: boolean): Promise<{ source: string; muted: boolean }> {
    await this.supervisor.send('SetInputMute', { inputName: source, inputMuted: muted });
    return { source, muted };
  }

  async mediaAction(source: string, action: MediaAction): Promise<{ source: string; action: MediaAction }> {
    await this.supervisor.send('TriggerMediaInputAction', { inputName: source, mediaAction: MEDIA_ACTIONS[action] });
    return { source, action };
  }

  /** テキストソースの文字列を差し替える */
  async setText(source: string, text: string): Promise<void> {
    await this.supervisor.send('SetInputSettings', { inputName: source, inputSettings: { text } });
  }

  /** シーン内のソースの表示/非表示 (目のアイコン) */
  async setSourceVisible(scene: string, source: string, visible: boolean): Promise<void> {
    const response = await this.supervisor.send('GetSceneItemId', { sceneName: scene, sourceName: source });
    const sceneItemId = response.sceneItemId;
    if (typeof sceneItemId !== 'number') {
      throw new UpstreamRequestError('GetSceneItemId', RESOURCE_NOT_FOUND, `"${source}" is not in scene "${scene}"`);
    }
    await this.supervisor.send('SetSceneItemEnabled', { sceneName: scene, sceneItemId, sceneItemEnabled: visible });
  }

  /** プレイリストのトラックをメディアソースに読み込む。ループは切り、終了通知で次へ送る */
  async loadTrack(track: Track): Promise<void> {
    const inputSettings = track.remote
      ? { is_local_file: false, input: track.path, looping: false }
      : { is_local_file: true, local_file: track.path, looping: false };
    await this.supervisor.send('SetInputSettings', { inputName: this.sourceName, inputSettings });

    if (track.trimIn !== null) {
      await this.supervisor.send('SetMediaInputCursor', {
        inputName: this.sourceName,
        mediaCursor: Math.round(track.trimIn * 1000),
      });
    }
  }
}

import type { EventBus } from '../core/EventBus.js';
import { NotFoundError, errorMessage } from '../core/errors.js';
import type { PlaylistScheduler } from '../playlist/PlaylistScheduler.js';
import type { SessionSupervisor } from '../session/SessionSupervisor.js';
import type { StudioController } from '../session/StudioController.js';

export type PresetAction =
  | { type: 'set_volume'; source: string; volumeDb: number }
  | { type: 'set_mute'; source: string; muted: boolean }
  | { type: 'media_play' | 'media_pause' | 'media_restart'; source: string };

export interface ScenePreset {
  name: string;
  sceneName: string;
  description: string;
  playlist: string | null;
  actions: PresetAction[];
}

export interface PresetStepResult {
  step: string;
  status: 'ok' | 'skipped' | 'failed';
  detail?: string;
}

export interface PresetActivation {
  preset: string;
  steps: PresetStepResult[];
}

export const DEFAULT_PRESETS: readonly ScenePreset[] = [
  { name: 'live', sceneName: 'Live', description: 'Main live broadcast scene', playlist: null, actions: [] },
  {
    name: 'brb',
    sceneName: 'BRB',
    description: 'Be Right Back screen',
    playlist: null,
    actions: [{ type: 'set_mute', source: 'Mic', muted: true }],
  },
  { name: 'standby', sceneName: 'Standby', description: 'Holding / pre-show screen', playlist: null, actions: [] },
  {
    name: 'intermission',
    sceneName: 'Intermission',
    description: 'Intermission loop with playlist',
    playlist: 'intermission',
    actions: [],
  },
  { name: 'end_card', sceneName: 'EndCard', description: 'Post-show slate', playlist: null, actions: [] },
];

/**
 * シーン切替 + 付随アクション + プレイリスト起動をまとめた「プリセット」
 */
export class PresetManager {
  private presets = new Map<string, ScenePreset>();
  private activePreset: string | null = null;

  constructor(
    private supervisor: SessionSupervisor,
    private studio: StudioController,
    private scheduler: PlaylistScheduler,
    private bus: EventBus,
    presets: readonly ScenePreset[] = [],
  ) {
    for (const preset of DEFAULT_PRESETS) this.presets.set(preset.name, preset);
    // 同名の設定は組み込みを上書き
    for (const preset of presets) this.presets.set(preset.name, preset);
  }

  list(): ScenePreset[] {
    return [...this.presets.values()];
  }

  get active(): string | null {
    return this.activePreset;
  }

  async activate(name: string): Promise<PresetActivation> {
    const preset = this.presets.get(name);
    if (!preset) {
      throw new NotFoundError(`Preset "${name}" not found. Available: ${[...this.presets.keys()].join(', ')}`);
    }

    const steps: PresetStepResult[] = [];

    if (this.supervisor.isConnected()) {
      steps.push(await this.runStep('switch_scene', () => this.studio.switchScene(preset.sceneName)));
    } else {
      console.warn(`[PresetManager] Session not connected, scene switch for "${name}" skipped`);
      steps.push({ step: 'switch_scene', status: 'skipped', detail: 'session not connected' });
    }

    for (const action of preset.actions) {
      steps.push(await this.runStep(action.type, () => this.runAction(action)));
    }

    if (preset.playlist !== null) {
      const playlist = preset.playlist;
      steps.push(await this.runStep('activate_playlist', () => this.scheduler.activate(playlist)));
    }

    this.activePreset = name;
    console.log(`[PresetManager] Activated preset "${name}"`);
    this.bus.publish({
      name: 'preset_activated',
      data: { preset: name, scene: preset.sceneName, playlist: preset.playlist },
    });
    return { preset: name, steps };
  }

  private async runStep(step: string, run: () => Promise<unknown>): Promise<PresetStepResult> {
    try {
      await run();
      return { step, status: 'ok' };
    } catch (err) {
      console.error(`[PresetManager] Step "${step}" failed: ${errorMessage(err)}`);
      return { step, status: 'failed', detail: errorMessage(err) };
    }
  }

  private async runAction(action: PresetAction): Promise<unknown> {
    switch (action.type) {
      case 'set_volume':
        return this.studio.setVolume(action.source, action.volumeDb);
      case 'set_mute':
        return this.studio.setMute(action.source, action.muted);
      case 'media_play':
        return this.studio.mediaAction(action.source, 'play');
      case 'media_pause':
        return this.studio.mediaAction(action.source, 'pause');
      case 'media_restart':
        return this.studio.mediaAction(action.source, 'restart');
    }
  }
}

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_PRESETS } from '../presets/PresetManager.js';
import { createHarness, type Harness } from './helpers/harness.js';

describe('PresetManager', () => {
  let h: Harness;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    h = createHarness();
  });

  afterEach(() => {
    h.broadcaster.close();
    vi.restoreAllMocks();
  });

  it('ships the built-in presets', () => {
    expect(h.presets.list().map((p) => p.name)).toEqual(['live', 'brb', 'standby', 'intermission', 'end_card']);
  });

  it('lets configured presets replace built-ins of the same name', () => {
    const custom = createHarness({
      presets: [
        { name: 'live', sceneName: 'Main Camera', description: '', playlist: null, actions: [] },
        { name: 'credits', sceneName: 'Credits', description: 'Roll credits', playlist: null, actions: [] },
      ],
    });

    const byName = new Map(custom.presets.list().map((p) => [p.name, p]));
    expect(byName.get('live')?.sceneName).toBe('Main Camera');
    expect(byName.get('credits')?.sceneName).toBe('Credits');
    expect(byName.size).toBe(DEFAULT_PRESETS.length + 1);
  });

  it('switches the scene and runs the preset actions in order', async () => {
    await h.supervisor.connect();

    const activation = await h.presets.activate('brb');

    expect(activation).toEqual({
      preset: 'brb',
      steps: [
        { step: 'switch_scene', status: 'ok' },
        { step: 'set_mute', status: 'ok' },
      ],
    });
    expect(h.transport().sent).toEqual([
      { type: 'SetCurrentProgramScene', data: { sceneName: 'BRB' } },
      { type: 'SetInputMute', data: { inputName: 'Mic', inputMuted: true } },
    ]);
    expect(h.presets.active).toBe('brb');
    expect(h.events.at(-1)).toMatchObject({
      name: 'preset_activated',
      data: { preset: 'brb', scene: 'BRB', playlist: null },
    });
  });

  it('activates the linked playlist', async () => {
    await h.supervisor.connect();

    const activation = await h.presets.activate('intermission');

    expect(activation.steps.map((s) => [s.step, s.status])).toEqual([
      ['switch_scene', 'ok'],
      ['activate_playlist', 'ok'],
    ]);
    expect(h.scheduler.status()).toMatchObject({ activePlaylist: 'intermission', position: 0 });
  });

  it('skips the scene switch while disconnected and reports the failed playlist step', async () => {
    const activation = await h.presets.activate('intermission');

    expect(activation.steps).toEqual([
      { step: 'switch_scene', status: 'skipped', detail: 'session not connected' },
      { step: 'activate_playlist', status: 'failed', detail: 'Cannot send SetInputSettings: session is disconnected' },
    ]);
    expect(h.presets.active).toBe('intermission');
  });

  it('keeps going after a failed action', async () => {
    const custom = createHarness({
      presets: [
        {
          name: 'show',
          sceneName: 'Show',
          description: '',
          playlist: null,
          actions: [
            { type: 'set_volume', source: 'Music', volumeDb: -20 },
            { type: 'media_restart', source: 'Countdown' },
          ],
        },
      ],
    });
    await custom.supervisor.connect();
    custom.transport().failing.add('SetInputVolume');

    const activation = await custom.presets.activate('show');

    expect(activation.steps).toEqual([
      { step: 'switch_scene', status: 'ok' },
      { step: 'set_volume', status: 'failed', detail: 'SetInputVolume failed (600): stubbed failure' },
      { step: 'media_restart', status: 'ok' },
    ]);
    expect(custom.transport().sent.at(-1)).toEqual({
      type: 'TriggerMediaInputAction',
      data: { inputName: 'Countdown', mediaAction: 'OBS_WEBSOCKET_MEDIA_INPUT_ACTION_RESTART' },
    });
    custom.broadcaster.close();
  });

  it('rejects unknown presets with NotFound', async () => {
    await expect(h.presets.activate('party')).rejects.toMatchObject({
      code: 'NotFound',
      message: 'Preset "party" not found. Available: live, brb, standby, intermission, end_card',
    });
  });
});

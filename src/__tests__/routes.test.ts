import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApiApp } from '../app.js';
import { createHarness, type Harness } from './helpers/harness.js';

describe('REST API', () => {
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

  describe('GET /health', () => {
    it('is 503 until the session is up', async () => {
      const res = await request(createApiApp(h)).get('/health');

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ healthy: false, session: { status: 'disconnected', attempts: 0 } });
    });

    it('is 200 while connected', async () => {
      await h.supervisor.connect();

      const res = await request(createApiApp(h)).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ healthy: true, session: { status: 'connected', attempts: 0 } });
    });
  });

  describe('POST /commands', () => {
    beforeEach(async () => {
      await h.supervisor.connect();
    });

    it('dispatches the envelope as given', async () => {
      const res = await request(createApiApp(h))
        .post('/commands')
        .send({ cmd: 'switch_scene', params: { scene_name: 'Live' } });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ok: true, command: 'switch_scene', data: { scene: 'Live' } });
    });

    it('answers 400 for unknown commands', async () => {
      const res = await request(createApiApp(h)).post('/commands').send({ cmd: 'format_disk' });

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({ code: 'SchemaError', message: 'Unknown command: format_disk' });
    });

    it('answers 400 for a body that is not JSON', async () => {
      const res = await request(createApiApp(h))
        .post('/commands')
        .set('Content-Type', 'application/json')
        .send('{"cmd": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        ok: false,
        command: null,
        error: { code: 'SchemaError', message: 'Body is not valid JSON' },
      });
    });

    it('answers 502 when the upstream refuses', async () => {
      h.transport().failing.add('StartStream');

      const res = await request(createApiApp(h)).post('/obs/stream/start');

      expect(res.status).toBe(502);
      expect(res.body.error.code).toBe('UpstreamError');
    });
  });

  it('answers 503 when the session is down', async () => {
    const res = await request(createApiApp(h)).post('/obs/stream/start');

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ ok: false, command: 'stream_start', error: { code: 'UpstreamUnavailable' } });
  });

  describe('playlists', () => {
    beforeEach(async () => {
      await h.supervisor.connect();
    });

    it('lists playlists with their preflight results', async () => {
      const app = createApiApp(h);

      const before = await request(app).get('/playlists');
      expect(before.body.playlists).toEqual([
        { name: 'main', trackCount: 3, loop: false, missing: null },
        { name: 'intermission', trackCount: 2, loop: true, missing: null },
      ]);

      await request(app).post('/playlists/validate').expect(200);

      const after = await request(app).get('/playlists');
      expect(after.body.playlists[1].missing).toEqual(['/media/slate.mp4', '/media/bumper.mp4']);
    });

    it('activates, advances and reports status', async () => {
      const app = createApiApp(h);

      await request(app).post('/playlists/main/activate').expect(200);
      const next = await request(app).post('/playlists/next');
      const status = await request(app).get('/playlists/status');

      expect(next.body).toMatchObject({ ok: true, command: 'playlist_next', data: { position: 1 } });
      expect(status.body).toMatchObject({
        activePlaylist: 'main',
        position: 1,
        totalTracks: 3,
        currentTrack: { title: 'feature' },
      });
    });

    it('answers 409 without an active playlist', async () => {
      const res = await request(createApiApp(h)).post('/playlists/next');

      expect(res.status).toBe(409);
      expect(res.body.error.code).toBe('NoActivePlaylist');
    });

    it('answers 404 for unknown playlists', async () => {
      const res = await request(createApiApp(h)).post('/playlists/nope/activate');

      expect(res.status).toBe(404);
      expect(res.body.error).toEqual({ code: 'NotFound', message: 'Playlist "nope" not found' });
    });

    it('answers 422 for a seek past the end and 400 for a non-numeric one', async () => {
      const app = createApiApp(h);
      await request(app).post('/playlists/main/activate').expect(200);

      const tooFar = await request(app).post('/playlists/seek/3');
      const notANumber = await request(app).post('/playlists/seek/second');

      expect(tooFar.status).toBe(422);
      expect(tooFar.body.error.code).toBe('OutOfRange');
      expect(notANumber.status).toBe(400);
    });

    it('toggles auto-advance', async () => {
      const res = await request(createApiApp(h)).post('/playlists/auto-advance').send({ enabled: false });

      expect(res.status).toBe(200);
      expect(h.scheduler.status().autoAdvance).toBe(false);
    });

    it('exports a playlist as M3U', async () => {
      const res = await request(createApiApp(h)).get('/playlists/intermission/export').responseType('blob');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toMatch(/^audio\/x-mpegurl/);
      expect(res.body.toString('utf-8')).toBe(
        '#EXTM3U\n\n#EXTINF:30,slate\n/media/slate.mp4\n\n#EXTINF:30,bumper\n/media/bumper.mp4\n',
      );
    });

    it('answers 404 when exporting an unknown playlist', async () => {
      const res = await request(createApiApp(h)).get('/playlists/nope/export');

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('NotFound');
    });
  });

  describe('presets and studio', () => {
    beforeEach(async () => {
      await h.supervisor.connect();
    });

    it('lists presets and activates one', async () => {
      const app = createApiApp(h);

      await request(app).post('/presets/brb/activate').expect(200);
      const res = await request(app).get('/presets');

      expect(res.body.active).toBe('brb');
      expect(res.body.presets).toHaveLength(5);
    });

    it('sends only the transition fields that were given', async () => {
      await request(createApiApp(h)).post('/obs/transition').send({ duration_ms: 250 }).expect(200);

      expect(h.transport().sent).toEqual([
        { type: 'SetCurrentSceneTransitionDuration', data: { transitionDuration: 250 } },
      ]);
    });

    it('switches scenes from the scene route', async () => {
      const res = await request(createApiApp(h)).post('/obs/scene').send({ scene_name: 'Live' });

      expect(res.body).toEqual({ ok: true, command: 'switch_scene', data: { scene: 'Live' } });
    });

    it('reports the relay status', async () => {
      const res = await request(createApiApp(h)).get('/status');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        ok: true,
        command: 'get_status',
        data: { healthy: true, preset: null, playlist: { activePlaylist: null } },
      });
    });
  });

  describe('overlay', () => {
    beforeEach(async () => {
      await h.supervisor.connect();
      h.transport().responses.set('GetSceneItemId', { sceneItemId: 3 });
    });

    afterEach(async () => {
      await h.overlay.stop();
    });

    it('triggers, reports and hides a title', async () => {
      const app = createApiApp(h);

      const triggered = await request(app)
        .post('/overlay/trigger')
        .send({ text: 'Back soon', hold_ms: 60000, delay_ms: 60000 });
      const status = await request(app).get('/overlay/status');
      const hidden = await request(app).post('/overlay/hide');

      expect(triggered.body).toEqual({
        ok: true,
        command: 'overlay_trigger',
        data: { text: 'Back soon', holdMs: 60000, delayMs: 60000, source: 'TitleOverlay' },
      });
      expect(status.body).toMatchObject({ active: true, visible: false, text: 'Back soon' });
      expect(hidden.body).toEqual({ ok: true, command: 'overlay_hide', data: { hidden: true, source: 'TitleOverlay' } });
    });

    it('answers 400 for a trigger without text', async () => {
      const res = await request(createApiApp(h)).post('/overlay/trigger').send({ hold_ms: 1000 });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('SchemaError');
    });

    it('changes the configuration', async () => {
      const app = createApiApp(h);

      const updated = await request(app).post('/overlay/config').send({ hold_ms: 4000, auto_trigger: false });
      const config = await request(app).get('/overlay/config');

      expect(updated.status).toBe(200);
      expect(config.body).toMatchObject({ holdMs: 4000, autoTrigger: false, sourceName: 'TitleOverlay' });
    });

    it('answers 409 for trigger-current without an active playlist', async () => {
      const res = await request(createApiApp(h)).post('/overlay/trigger-current');

      expect(res.status).toBe(409);
      expect(res.body.error.code).toBe('NoActivePlaylist');
    });
  });

  describe('with an access key', () => {
    let secured: Harness;

    beforeEach(async () => {
      secured = createHarness({ apiKey: 'test-secret' });
      await secured.supervisor.connect();
    });

    afterEach(() => {
      secured.broadcaster.close();
    });

    it('rejects read routes without the bearer key', async () => {
      const res = await request(createApiApp(secured)).get('/playlists');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ ok: false, command: null, error: { code: 'AuthError', message: 'Unauthorized' } });
    });

    it('rejects commands with the wrong key', async () => {
      const res = await request(createApiApp(secured))
        .post('/commands')
        .set('Authorization', 'Bearer wrong-secret')
        .send({ cmd: 'playlist_next' });

      expect(res.status).toBe(401);
      expect(res.body.command).toBe('playlist_next');
    });

    it('accepts the bearer key', async () => {
      const app = createApiApp(secured);

      const list = await request(app).get('/presets').set('Authorization', 'Bearer test-secret');
      const command = await request(app)
        .post('/obs/scene')
        .set('Authorization', 'Bearer test-secret')
        .send({ scene_name: 'Live' });

      expect(list.status).toBe(200);
      expect(command.status).toBe(200);
    });

    it('keeps /health open', async () => {
      const res = await request(createApiApp(secured)).get('/health');

      expect(res.status).toBe(200);
    });
  });
});

import { Router } from 'express';
import type { CommandRouter } from '../command/CommandRouter.js';
import { NotFoundError, httpStatusFor } from '../core/errors.js';
import type { PlaylistLibrary } from '../playlist/PlaylistLibrary.js';
import type { PlaylistScheduler } from '../playlist/PlaylistScheduler.js';
import { serializeM3U } from '../playlist/m3u.js';
import { requireApiKey } from '../middleware/auth.js';
import { dispatchFromRequest } from './respond.js';

export function createPlaylistRoutes(
  router: CommandRouter,
  library: PlaylistLibrary,
  scheduler: PlaylistScheduler,
): Router {
  const routes = Router();

  /**
   * GET /playlists — 読み込み済みプレイリスト一覧
   */
  routes.get('/playlists', requireApiKey(router), (_req, res) => {
    const playlists = library.list().map((playlist) => ({
      name: playlist.name,
      trackCount: playlist.tracks.length,
      loop: playlist.loop,
      missing: library.preflightFor(playlist.name),
    }));
    res.json({ playlists });
  });

  /**
   * GET /playlists/status — 再生位置と現在のトラック
   */
  routes.get('/playlists/status', requireApiKey(router), (_req, res) => {
    res.json(scheduler.status());
  });

  routes.post('/playlists/validate', (req, res) =>
    dispatchFromRequest(router, req, res, { cmd: 'playlist_validate' }),
  );

  routes.post('/playlists/next', (req, res) => dispatchFromRequest(router, req, res, { cmd: 'playlist_next' }));

  routes.post('/playlists/prev', (req, res) => dispatchFromRequest(router, req, res, { cmd: 'playlist_prev' }));

  /**
   * POST /playlists/seek/:position — 0 始まり
   */
  routes.post('/playlists/seek/:position', (req, res) =>
    dispatchFromRequest(router, req, res, {
      cmd: 'playlist_seek',
      params: { position: Number(req.params.position) },
    }),
  );

  /**
   * POST /playlists/auto-advance
   * Body: { enabled: boolean }
   */
  routes.post('/playlists/auto-advance', (req, res) =>
    dispatchFromRequest(router, req, res, {
      cmd: 'set_auto_advance',
      params: { enabled: bodyField(req.body, 'enabled') },
    }),
  );

  /**
   * GET /playlists/:name/export — 解決済みパスで M3U を書き出す
   */
  routes.get('/playlists/:name/export', requireApiKey(router), (req, res) => {
    const playlist = library.get(req.params.name);
    if (!playlist) {
      const error = new NotFoundError(`Playlist "${req.params.name}" not found`);
      res.status(httpStatusFor(error.code)).json({ ok: false, command: null, error: error.toBody() });
      return;
    }
    res.type('audio/x-mpegurl').send(serializeM3U(playlist));
  });

  routes.post('/playlists/:name/activate', (req, res) =>
    dispatchFromRequest(router, req, res, { cmd: 'playlist_activate', params: { name: req.params.name } }),
  );

  return routes;
}

/** JSON ボディから 1 項目だけ取り出す。型チェックはコマンドスキーマに任せる */
export function bodyField(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  return Object.entries(body).find(([name]) => name === key)?.[1];
}

import { Router } from 'express';
import type { CommandRouter } from '../command/CommandRouter.js';
import type { OverlayManager } from '../overlay/OverlayManager.js';
import { requireApiKey } from '../middleware/auth.js';
import { bodyField } from './playlist.routes.js';
import { dispatchFromRequest } from './respond.js';

export function createOverlayRoutes(router: CommandRouter, overlay: OverlayManager): Router {
  const routes = Router();

  /**
   * GET /overlay/status — 表示中の文字列・残り時間・設定
   */
  routes.get('/overlay/status', requireApiKey(router), (_req, res) => {
    res.json(overlay.status());
  });

  routes.get('/overlay/config', requireApiKey(router), (_req, res) => {
    res.json(overlay.configuration());
  });

  /**
   * POST /overlay/config — 変更する項目だけ渡す
   * Body: { enabled?, source_name?, scene_name?, hold_ms?, delay_ms?, prefix?, suffix?, auto_trigger? }
   */
  routes.post('/overlay/config', (req, res) =>
    dispatchFromRequest(router, req, res, { cmd: 'overlay_configure', params: req.body }),
  );

  /**
   * POST /overlay/trigger — 任意の文字列を表示 (表示中のものは置き換え)
   * Body: { text: string, hold_ms?: number, delay_ms?: number }
   */
  routes.post('/overlay/trigger', (req, res) =>
    dispatchFromRequest(router, req, res, {
      cmd: 'overlay_trigger',
      params: {
        text: bodyField(req.body, 'text'),
        hold_ms: bodyField(req.body, 'hold_ms'),
        delay_ms: bodyField(req.body, 'delay_ms'),
      },
    }),
  );

  routes.post('/overlay/hide', (req, res) => dispatchFromRequest(router, req, res, { cmd: 'overlay_hide' }));

  /**
   * POST /overlay/trigger-current — 再生中のトラックのタイトルをもう一度出す
   */
  routes.post('/overlay/trigger-current', (req, res) =>
    dispatchFromRequest(router, req, res, { cmd: 'overlay_trigger_current' }),
  );

  return routes;
}

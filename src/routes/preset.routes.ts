import { Router } from 'express';
import type { CommandRouter } from '../command/CommandRouter.js';
import type { PresetManager } from '../presets/PresetManager.js';
import { requireApiKey } from '../middleware/auth.js';
import { dispatchFromRequest } from './respond.js';

export function createPresetRoutes(router: CommandRouter, presets: PresetManager): Router {
  const routes = Router();

  /**
   * GET /presets — プリセット一覧と現在のプリセット
   */
  routes.get('/presets', requireApiKey(router), (_req, res) => {
    res.json({ active: presets.active, presets: presets.list() });
  });

  routes.post('/presets/:name/activate', (req, res) =>
    dispatchFromRequest(router, req, res, { cmd: 'activate_preset', params: { name: req.params.name } }),
  );

  return routes;
}

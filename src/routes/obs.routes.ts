import { Router } from 'express';
import type { CommandRouter } from '../command/CommandRouter.js';
import { bodyField } from './playlist.routes.js';
import { dispatchFromRequest } from './respond.js';

export function createObsRoutes(router: CommandRouter): Router {
  const routes = Router();

  /**
   * POST /obs/scene
   * Body: { scene_name: string }
   */
  routes.post('/obs/scene', (req, res) =>
    dispatchFromRequest(router, req, res, {
      cmd: 'switch_scene',
      params: { scene_name: bodyField(req.body, 'scene_name') },
    }),
  );

  routes.post('/obs/stream/start', (req, res) => dispatchFromRequest(router, req, res, { cmd: 'stream_start' }));
  routes.post('/obs/stream/stop', (req, res) => dispatchFromRequest(router, req, res, { cmd: 'stream_stop' }));
  routes.post('/obs/record/start', (req, res) => dispatchFromRequest(router, req, res, { cmd: 'record_start' }));
  routes.post('/obs/record/stop', (req, res) => dispatchFromRequest(router, req, res, { cmd: 'record_stop' }));

  /**
   * POST /obs/transition
   * Body: { name?: string, duration_ms?: number }
   */
  routes.post('/obs/transition', (req, res) => {
    const params: Record<string, unknown> = {};
    for (const key of ['name', 'duration_ms']) {
      const value = bodyField(req.body, key);
      if (value !== undefined) params[key] = value;
    }
    return dispatchFromRequest(router, req, res, { cmd: 'set_transition', params });
  });

  routes.post('/session/reconnect', (req, res) =>
    dispatchFromRequest(router, req, res, { cmd: 'session_reconnect' }),
  );

  return routes;
}

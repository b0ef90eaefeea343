import { Router } from 'express';
import type { CommandRouter } from '../command/CommandRouter.js';
import type { SessionSupervisor } from '../session/SessionSupervisor.js';
import { dispatchFromRequest } from './respond.js';

export function createStatusRoutes(router: CommandRouter, supervisor: SessionSupervisor): Router {
  const routes = Router();

  /**
   * POST /commands — 汎用エンドポイント
   * Body: { cmd: string, params?: object }
   */
  routes.post('/commands', (req, res) => dispatchFromRequest(router, req, res, req.body));

  /**
   * GET /status — セッション・シーン・プリセット・プレイリストの状態
   */
  routes.get('/status', (req, res) => dispatchFromRequest(router, req, res, { cmd: 'get_status' }));

  /**
   * GET /health — 監視用 (認証なし)。アップストリーム接続中のみ 200
   */
  routes.get('/health', (_req, res) => {
    const session = supervisor.currentState();
    res.status(supervisor.isConnected() ? 200 : 503).json({ healthy: supervisor.isConnected(), session });
  });

  return routes;
}

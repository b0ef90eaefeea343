import express, { type Express } from 'express';
import type { CommandRouter } from './command/CommandRouter.js';
import { SchemaError } from './core/errors.js';
import type { PlaylistLibrary } from './playlist/PlaylistLibrary.js';
import type { PlaylistScheduler } from './playlist/PlaylistScheduler.js';
import type { PresetManager } from './presets/PresetManager.js';
import type { OverlayManager } from './overlay/OverlayManager.js';
import { createObsRoutes } from './routes/obs.routes.js';
import { createOverlayRoutes } from './routes/overlay.routes.js';
import { createPlaylistRoutes } from './routes/playlist.routes.js';
import { createPresetRoutes } from './routes/preset.routes.js';
import { createStatusRoutes } from './routes/status.routes.js';
import type { SessionSupervisor } from './session/SessionSupervisor.js';

export interface ApiDeps {
  router: CommandRouter;
  supervisor: SessionSupervisor;
  library: PlaylistLibrary;
  scheduler: PlaylistScheduler;
  presets: PresetManager;
  overlay: OverlayManager;
}

export function createApiApp(deps: ApiDeps): Express {
  const app = express();

  app.use(express.json());
  app.use(createStatusRoutes(deps.router, deps.supervisor));
  app.use(createPlaylistRoutes(deps.router, deps.library, deps.scheduler));
  app.use(createPresetRoutes(deps.router, deps.presets));
  app.use(createObsRoutes(deps.router));
  app.use(createOverlayRoutes(deps.router, deps.overlay));

  // express.json() のパース失敗
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ ok: false, command: null, error: new SchemaError('Body is not valid JSON').toBody() });
      return;
    }
    next(err);
  });

  return app;
}

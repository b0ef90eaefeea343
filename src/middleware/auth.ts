import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthError } from '../core/errors.js';
import type { CommandRouter } from '../command/CommandRouter.js';

/** `Authorization: Bearer <key>` からキーを取り出す */
export function bearerToken(req: Request): string | undefined {
  const auth = req.headers.authorization;
  if (!auth || !auth.startsWith('Bearer ')) return undefined;
  return auth.slice('Bearer '.length);
}

/**
 * 読み取り専用ルート用。コマンド系は CommandRouter 側で同じ判定をする
 */
export function requireApiKey(router: CommandRouter): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (router.checkCredential(bearerToken(req))) {
      next();
      return;
    }
    res.status(401).json({ ok: false, command: null, error: new AuthError().toBody() });
  };
}

import type { Request, Response } from 'express';
import type { CommandRouter, CommandResult } from '../command/CommandRouter.js';
import { errorMessage, httpStatusFor } from '../core/errors.js';
import { bearerToken } from '../middleware/auth.js';

export function sendResult(res: Response, result: CommandResult): void {
  res.status(result.ok ? 200 : httpStatusFor(result.error.code)).json(result);
}

/**
 * REST の各ルートは `{ cmd, params }` を組み立ててここに渡すだけ
 */
export async function dispatchFromRequest(
  router: CommandRouter,
  req: Request,
  res: Response,
  raw: unknown,
): Promise<void> {
  try {
    const result = await router.dispatch(raw, {
      subscriberId: `rest:${req.ip ?? 'unknown'}`,
      credential: bearerToken(req),
    });
    sendResult(res, result);
  } catch (err) {
    console.error(`[API] ${req.method} ${req.path} failed:`, err);
    res.status(500).json({ ok: false, command: null, error: { code: 'InternalError', message: errorMessage(err) } });
  }
}

import { Router, Request, Response } from 'express';
import type { AppConfig } from '../models/config.model';
import type { RootHelper } from '../services/airprint.service';
import { requireToken } from '../middleware/token.middleware';
import { logger } from '../utils/logger';

export function createSystemRouter(rootHelper: RootHelper, getConfig: () => AppConfig): Router {
  const router = Router();
  const guard = requireToken(getConfig);

  /** POST /api/restart-host - Reboot via the root helper */
  router.post('/restart-host', guard, async (_req: Request, res: Response) => {
    try {
      const output = await rootHelper.restartHost();
      logger.warn('Host restart requested');
      res.json({ ok: true, output });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      res.status(500).json({ ok: false, error: msg });
    }
  });

  /** POST /api/airprint/ensure - Re-advertise printers over AirPrint */
  router.post('/airprint/ensure', guard, async (_req: Request, res: Response) => {
    try {
      const output = await rootHelper.ensureAirprint();
      res.json({ ok: true, output });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      res.status(500).json({ ok: false, error: msg });
    }
  });

  return router;
}

import { Router, Request, Response } from 'express';
import type { AppConfig } from '../models/config.model';
import type { ConfigStore } from '../services/config-store.service';
import type { RootHelper } from '../services/airprint.service';
import { requireToken } from '../middleware/token.middleware';
import { deepMerge, isPlainObject } from '../validators/config.validator';
import { logger } from '../utils/logger';
import { statusCodeOf } from '../utils/errors';

export function createConfigRouter(store: ConfigStore, rootHelper: RootHelper): Router {
  const router = Router();

  /** GET /api/config - Current normalized config */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ config: store.current() });
  });

  /** POST /api/config - Overlay `{config}` onto the stored document and return the result */
  router.post('/', requireToken(() => store.current()), async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isPlainObject(body) || !('config' in body)) {
      return res.status(400).json({ ok: false, error: 'Expected JSON body: {config: {...}}' });
    }
    const incoming = body.config;
    if (!isPlainObject(incoming)) {
      return res.status(400).json({ ok: false, error: 'config must be an object' });
    }

    let saved: AppConfig;
    try {
      saved = await store.update((current) => deepMerge(current, incoming));
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return res.status(statusCodeOf(error)).json({ ok: false, error: msg });
    }

    if (saved.airprint.auto_enable) {
      try {
        await rootHelper.ensureAirprint();
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        logger.warn({ error }, 'AirPrint ensure after config save failed');
        return res.status(500).json({ ok: false, error: msg, config: saved });
      }
    }

    res.json({ ok: true, config: saved });
  });

  return router;
}

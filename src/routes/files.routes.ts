import { Router, Request, Response } from 'express';
import type { AppConfig } from '../models/config.model';
import type { UploadStore } from '../services/upload.service';
import { requireToken } from '../middleware/token.middleware';
import { statusCodeOf } from '../utils/errors';

export function createFilesRouter(uploads: UploadStore, getConfig: () => AppConfig): Router {
  const router = Router();

  /** GET /api/files - Most recent uploads first */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json({ files: await uploads.list(50) });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      res.status(statusCodeOf(error)).json({ ok: false, error: msg });
    }
  });

  /** DELETE /api/files/:name - Remove an upload */
  router.delete('/:name', requireToken(getConfig), async (req: Request, res: Response) => {
    try {
      await uploads.remove(String(req.params.name));
      res.json({ ok: true });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      res.status(statusCodeOf(error)).json({ ok: false, error: msg });
    }
  });

  return router;
}

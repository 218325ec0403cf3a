import { Router, Request, Response } from 'express';
import type { AppConfig } from '../models/config.model';
import type { PrinterGateway } from '../services/cups.service';
import type { StatusAggregator } from '../services/status.service';
import { requireToken } from '../middleware/token.middleware';
import { statusCodeOf } from '../utils/errors';

export function createStatusRouter(
  status: StatusAggregator,
  gateway: PrinterGateway,
  getConfig: () => AppConfig
): Router {
  const router = Router();

  /** GET /api/status - Current printer/queue snapshot (never fails; degrades instead) */
  router.get('/status', async (_req: Request, res: Response) => {
    res.json(await status.getSnapshot());
  });

  /** GET /api/printer/:name - `lpstat -l -p` output for one printer */
  router.get('/printer/:name', async (req: Request, res: Response) => {
    try {
      res.json(await gateway.printerDetail(String(req.params.name)));
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      res.status(statusCodeOf(error)).json({ ok: false, error: msg });
    }
  });

  /** POST /api/jobs/:id/cancel - Cancel a queued CUPS request */
  router.post('/jobs/:id/cancel', requireToken(getConfig), async (req: Request, res: Response) => {
    try {
      await gateway.cancelJob(String(req.params.id));
      res.json({ ok: true });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      res.status(statusCodeOf(error)).json({ ok: false, error: msg });
    }
  });

  return router;
}

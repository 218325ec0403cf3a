import { Router, Request, Response } from 'express';
import type { ConfigStore } from '../services/config-store.service';
import type { PrintService } from '../services/print.service';
import { requireToken } from '../middleware/token.middleware';
import { resolvePrintRequest } from '../validators/print.validator';
import { statusCodeOf } from '../utils/errors';

export function createPrintRouter(printer: PrintService, store: ConfigStore): Router {
  const router = Router();

  /** POST /api/print - Print an uploaded file: {filename, mode, printer, copies} */
  router.post('/', requireToken(() => store.current()), async (req: Request, res: Response) => {
    try {
      const request = resolvePrintRequest(req.body, store.current().printing);
      const stdout = await printer.submit(request);
      res.json({ ok: true, lp_stdout: stdout });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      res.status(statusCodeOf(error)).json({ ok: false, error: msg });
    }
  });

  return router;
}

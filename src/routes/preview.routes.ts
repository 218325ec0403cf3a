import { Router, Request, Response } from 'express';
import type { ConfigStore } from '../services/config-store.service';
import type { Renderer } from '../services/render.service';
import type { UploadStore } from '../services/upload.service';
import { previewQuerySchema } from '../validators/preview.validator';
import { statusCodeOf } from '../utils/errors';

export function createPreviewRouter(uploads: UploadStore, renderer: Renderer, store: ConfigStore): Router {
  const router = Router();

  /** GET /api/preview/:filename?mode=&page=&w=&_= - One page rendered as PNG */
  router.get('/:filename', async (req: Request, res: Response) => {
    const query = previewQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).type('text/plain').send(query.error.issues[0]?.message ?? 'Invalid preview request');
    }

    try {
      const filePath = await uploads.resolve(String(req.params.filename));
      const { printing } = store.current();
      const png = await renderer.renderPreview(filePath, {
        mode: query.data.mode ?? printing.default_mode,
        page: query.data.page,
        width: query.data.w,
        previewDpi: printing.preview_dpi,
        threshold: printing.bw_threshold,
      });
      res.setHeader('Cache-Control', 'no-store');
      res.type('image/png').send(png);
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      res.status(statusCodeOf(error, 400)).type('text/plain').send(msg);
    }
  });

  return router;
}

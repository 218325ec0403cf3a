import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import type { AppConfig } from '../models/config.model';
import type { UploadStore } from '../services/upload.service';
import { requireToken } from '../middleware/token.middleware';
import { statusCodeOf } from '../utils/errors';

export function createUploadRouter(uploads: UploadStore, getConfig: () => AppConfig, tempDir: string): Router {
  const router = Router();

  /** POST /upload - Multipart upload of one `file`; browsers are redirected back to the UI */
  router.post('/upload', requireToken(getConfig), (req: Request, res: Response, next: NextFunction) => {
    // The size limit follows the live config, so multer is built per request
    const upload = multer({
      dest: tempDir,
      limits: { fileSize: getConfig().app.max_upload_mb * 1024 * 1024 },
    }).single('file');

    upload(req, res, async (err: unknown) => {
      if (err) return next(err);
      if (!req.file) {
        return res.status(400).json({ ok: false, error: 'No file provided' });
      }

      try {
        const name = await uploads.store(req.file.path, req.file.originalname);
        if (req.accepts(['html', 'json']) === 'json') {
          return res.status(201).json({ ok: true, name });
        }
        res.redirect(303, '/');
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        res.status(statusCodeOf(error)).json({ ok: false, error: msg });
      }
    });
  });

  /** GET /uploads/:name - Download an upload as an attachment */
  router.get('/uploads/:name', async (req: Request, res: Response) => {
    try {
      const filePath = await uploads.resolve(String(req.params.name));
      res.download(filePath);
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      res.status(statusCodeOf(error)).json({ ok: false, error: msg });
    }
  });

  return router;
}

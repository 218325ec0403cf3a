import type { ErrorRequestHandler } from 'express';
import multer from 'multer';
import { statusCodeOf } from '../utils/errors';
import { logger } from '../utils/logger';

/** Last-resort handler: multer limits, body-parser JSON errors and anything a route rethrew */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  let status = statusCodeOf(err);
  let message = err instanceof Error ? err.message : String(err);

  if (err instanceof multer.MulterError) {
    status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
  } else if (err instanceof SyntaxError && 'body' in err) {
    status = 400;
    message = 'Invalid JSON';
  }

  if (status >= 500) {
    logger.error({ err, path: req.path }, 'Unhandled request error');
  }
  res.status(status).json({ ok: false, error: message });
};

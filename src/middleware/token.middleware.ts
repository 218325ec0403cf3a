import type { RequestHandler } from 'express';
import type { AppConfig } from '../models/config.model';
import { logger } from '../utils/logger';

export const TOKEN_HEADER = 'X-PrinterPal-Token';

/** Gate mutating endpoints when `security.require_token` is on */
export function requireToken(getConfig: () => AppConfig): RequestHandler {
  return (req, res, next) => {
    const { security } = getConfig();
    if (!security.require_token) return next();

    const expected = security.token.trim();
    if (!expected) {
      return res.status(503).json({ ok: false, error: 'Auth token required but not configured' });
    }

    const provided = req.get(TOKEN_HEADER) ?? (typeof req.query.token === 'string' ? req.query.token : undefined);
    if (provided !== expected) {
      logger.warn({ path: req.path, ip: req.ip }, 'Rejected request with missing or wrong token');
      return res.status(401).json({ ok: false, error: 'Unauthorized' });
    }
    next();
  };
}

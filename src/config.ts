import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

dotenv.config();

// In dev: project root. In dist/: one level above the compiled sources.
const baseDir = fs.existsSync(path.join(__dirname, '..', 'package.json'))
  ? path.join(__dirname, '..')
  : path.join(__dirname, '..', '..');

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(baseDir, 'package.json'), 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    return '0.0.0';
  }
  return '0.0.0';
}

export const config = {
  port: parseInt(process.env.PORT || '80', 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  configPath: process.env.PRINTERPAL_CONFIG || '/etc/printerpal/config.json',
  uploadsDir: process.env.PRINTERPAL_UPLOAD_DIR || '/var/lib/printerpal/uploads',
  cacheDir: process.env.PRINTERPAL_CACHE_DIR || '/var/lib/printerpal/cache',
  rootHelper: process.env.PRINTERPAL_ROOT_HELPER || '/usr/local/sbin/printerpal-root',
  eventIntervalMs: parseInt(process.env.PRINTERPAL_EVENT_INTERVAL_MS || '2000', 10),
  cupsPrintersConf: ['/etc/cups/printers.conf', '/etc/cups/printers.conf.O'],
  publicDir: path.join(baseDir, 'public'),
  baseDir,
  version: readVersion(),
} as const;

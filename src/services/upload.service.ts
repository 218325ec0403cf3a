import fs from 'fs/promises';
import path from 'path';
import type { UploadedFile } from '../models/status.model';
import { PrinterPalError } from '../utils/errors';
import { humanBytes } from '../utils/format';
import { logger } from '../utils/logger';

export const SUPPORTED_IMAGE_EXTS: readonly string[] = ['.png', '.jpg', '.jpeg', '.bmp', '.tif', '.tiff'];
export const ALLOWED_EXTS: readonly string[] = ['.pdf', ...SUPPORTED_IMAGE_EXTS];

export interface UploadStore {
  readonly dir: string;
  list(limit?: number): Promise<UploadedFile[]>;
  /** Absolute path of an existing upload; throws 404 when missing */
  resolve(name: string): Promise<string>;
  /** Move a received temp file into the store, returns the stored name */
  store(tempPath: string, originalName: string): Promise<string>;
  remove(name: string): Promise<void>;
}

export function isAllowedFilename(filename: string): boolean {
  return ALLOWED_EXTS.includes(path.extname(filename).toLowerCase());
}

/**
 * Reduce a client-supplied name to ASCII letters, digits, `_`, `.` and `-`.
 * "../My Report (1).pdf" -> "My_Report_1.pdf"
 */
export function sanitizeFilename(filename: string): string {
  const ascii = filename.normalize('NFKD').replace(/[^\x20-\x7e]/g, '');
  const flattened = ascii.replace(/[/\\]/g, ' ').trim().split(/\s+/).join('_');
  return flattened.replace(/[^A-Za-z0-9_.-]/g, '').replace(/^[._]+|[._]+$/g, '');
}

/** Names must already be sanitized: no separators, no traversal, no dotfiles */
function isSafeName(name: string): boolean {
  return name.length > 0 && path.basename(name) === name && !name.startsWith('.');
}

export function createUploadStore(dir: string): UploadStore {
  async function exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async function resolveUpload(name: string): Promise<string> {
    if (!isSafeName(name)) {
      throw new PrinterPalError('Invalid filename', 400);
    }
    const filePath = path.join(dir, name);
    if (!(await exists(filePath))) {
      throw new PrinterPalError('File not found', 404);
    }
    return filePath;
  }

  async function keep(tempPath: string, originalName: string): Promise<string> {
    const filename = sanitizeFilename(originalName);
    if (!filename) {
      throw new PrinterPalError('Invalid filename', 400);
    }
    if (!isAllowedFilename(filename)) {
      throw new PrinterPalError('Unsupported file type. Use PDF or common image formats.', 415);
    }

    await fs.mkdir(dir, { recursive: true });
    const ext = path.extname(filename);
    let outName = filename;
    if (await exists(path.join(dir, outName))) {
      outName = `${path.basename(filename, ext)}_${Math.floor(Date.now() / 1000)}${ext}`;
    }

    // copy + unlink: the temp dir may sit on another filesystem
    await fs.copyFile(tempPath, path.join(dir, outName));
    await fs.unlink(tempPath);
    logger.info({ filename: outName }, 'Upload stored');
    return outName;
  }

  return {
    dir,

    async list(limit = 25) {
      let names: string[];
      try {
        names = await fs.readdir(dir);
      } catch (error) {
        logger.warn({ error, dir }, 'Upload directory not readable');
        return [];
      }

      const files: UploadedFile[] = [];
      for (const name of names) {
        try {
          const stat = await fs.stat(path.join(dir, name));
          if (!stat.isFile()) continue;
          files.push({
            name,
            size: stat.size,
            size_h: humanBytes(stat.size),
            mtime: Math.floor(stat.mtimeMs / 1000),
          });
        } catch {
          // Deleted between readdir and stat
          continue;
        }
      }

      files.sort((a, b) => b.mtime - a.mtime || a.name.localeCompare(b.name));
      return files.slice(0, Math.max(1, Math.min(limit, 200)));
    },

    resolve: resolveUpload,

    async store(tempPath, originalName) {
      try {
        return await keep(tempPath, originalName);
      } catch (error) {
        // The received body goes either into the upload dir or away
        await fs.rm(tempPath, { force: true });
        throw error;
      }
    },

    async remove(name) {
      const filePath = await resolveUpload(name);
      await fs.unlink(filePath);
      logger.info({ filename: name }, 'Upload deleted');
    },
  };
}

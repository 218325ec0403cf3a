import fs from 'fs/promises';
import path from 'path';
import { PDFDocument } from 'pdf-lib';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import type { PrintMode } from '../models/print-job.model';
import { type CommandRunner, runCommand } from '../utils/command';
import { PrinterPalError } from '../utils/errors';
import { logger } from '../utils/logger';
import { pxToPt, thresholdToPercent } from '../utils/unit-converter';
import { SUPPORTED_IMAGE_EXTS } from './upload.service';

export interface PreviewOptions {
  readonly mode: PrintMode;
  readonly page: number;
  readonly width: number;
  readonly previewDpi: number;
  readonly threshold: number;
}

export interface PrintPrepOptions {
  readonly mode: PrintMode;
  readonly printDpi: number;
  readonly maxPdfPages: number;
  readonly threshold: number;
}

export interface PreparedPrintFile {
  readonly path: string;
  /** false when the original is printed as-is */
  readonly prepared: boolean;
  readonly pages?: number;
  /** Remove any temp output; no-op for unprepared files */
  cleanup(): Promise<void>;
}

export interface Renderer {
  renderPreview(filePath: string, options: PreviewOptions): Promise<Buffer>;
  preparePrintFile(filePath: string, options: PrintPrepOptions): Promise<PreparedPrintFile>;
}

/** ImageMagick arguments applying a print mode to a raster */
export function modeArgs(mode: PrintMode, threshold: number): string[] {
  switch (mode) {
    case 'raw':
      return [];
    case 'grayscale':
      return ['-colorspace', 'Gray'];
    case 'bw':
      return ['-colorspace', 'Gray', '-threshold', thresholdToPercent(threshold)];
    case 'dither':
      return ['-colorspace', 'Gray', '-dither', 'FloydSteinberg', '-monochrome'];
    case 'outline':
      return ['-colorspace', 'Gray', '-edge', '1', '-auto-level', '-negate', '-threshold', thresholdToPercent(threshold)];
  }
}

function kindOf(filePath: string): 'pdf' | 'image' | null {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.pdf') return 'pdf';
  return SUPPORTED_IMAGE_EXTS.includes(ext) ? 'image' : null;
}

export async function countPdfPages(filePath: string): Promise<number> {
  try {
    const doc = await PDFDocument.load(await fs.readFile(filePath), { ignoreEncryption: true, updateMetadata: false });
    return doc.getPageCount();
  } catch (error) {
    throw new PrinterPalError(`Unable to read PDF: ${error instanceof Error ? error.message : String(error)}`, 400);
  }
}

export function createRenderer(run: CommandRunner = runCommand, workDir: string = config.cacheDir): Renderer {
  async function withTempDir<T>(task: (dir: string) => Promise<T>): Promise<T> {
    const dir = path.join(workDir, `render-${uuidv4()}`);
    await fs.mkdir(dir, { recursive: true });
    try {
      return await task(dir);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  /** Rasterize one 1-based PDF page to PNG with pdftoppm */
  async function rasterizePdfPage(src: string, page: number, dpi: number, outPrefix: string): Promise<string> {
    await run(
      ['pdftoppm', '-png', '-f', String(page), '-l', String(page), '-r', String(dpi), '-singlefile', src, outPrefix],
      { timeoutMs: 25_000 }
    );
    const png = `${outPrefix}.png`;
    try {
      await fs.access(png);
    } catch {
      throw new PrinterPalError('pdftoppm did not produce expected PNG output');
    }
    return png;
  }

  /** Apply the mode (and optional resize) with ImageMagick, writing a PNG */
  async function convert(src: string, out: string, mode: PrintMode, threshold: number, width?: number): Promise<void> {
    const resize = width ? ['-resize', `${width}x>`] : [];
    await run(['convert', src, ...modeArgs(mode, threshold), ...resize, `png:${out}`], { timeoutMs: 25_000 });
  }

  async function renderPreview(filePath: string, options: PreviewOptions): Promise<Buffer> {
    if (options.width < 64 || options.width > 2000) {
      throw new PrinterPalError('width must be between 64 and 2000', 400);
    }
    if (options.page < 1) {
      throw new PrinterPalError('page must be >= 1', 400);
    }
    const kind = kindOf(filePath);
    if (!kind) {
      throw new PrinterPalError('Preview supports PDF and common image formats', 400);
    }

    return withTempDir(async (dir) => {
      const source =
        kind === 'pdf'
          ? await rasterizePdfPage(filePath, options.page, options.previewDpi, path.join(dir, 'page'))
          : `${filePath}[0]`;
      const out = path.join(dir, 'preview.png');
      await convert(source, out, options.mode, options.threshold, options.width);
      return fs.readFile(out);
    });
  }

  /** Embed rendered pages into one PDF sized for the raster DPI */
  async function assemblePdf(pngPaths: readonly string[], dpi: number): Promise<Uint8Array> {
    const doc = await PDFDocument.create();
    for (const pngPath of pngPaths) {
      const image = await doc.embedPng(await fs.readFile(pngPath));
      const width = pxToPt(image.width, dpi);
      const height = pxToPt(image.height, dpi);
      const page = doc.addPage([width, height]);
      page.drawImage(image, { x: 0, y: 0, width, height });
    }
    return doc.save();
  }

  async function preparePrintFile(filePath: string, options: PrintPrepOptions): Promise<PreparedPrintFile> {
    if (options.mode === 'raw') {
      return { path: filePath, prepared: false, cleanup: async () => undefined };
    }
    const kind = kindOf(filePath);
    if (!kind) {
      throw new PrinterPalError('Unsupported file type for printing', 400);
    }

    let pages = 1;
    if (kind === 'pdf') {
      pages = await countPdfPages(filePath);
      if (pages > options.maxPdfPages) {
        throw new PrinterPalError(
          `PDF has ${pages} pages, which exceeds processing limit (${options.maxPdfPages}). ` +
            "Either increase printing.max_pdf_pages_process or use 'Raw' mode.",
          400
        );
      }
    }

    const pdfBytes = await withTempDir(async (dir) => {
      const rendered: string[] = [];
      for (let page = 1; page <= pages; page++) {
        const source =
          kind === 'pdf'
            ? await rasterizePdfPage(filePath, page, options.printDpi, path.join(dir, `src-${page}`))
            : `${filePath}[0]`;
        const out = path.join(dir, `page-${page}.png`);
        await convert(source, out, options.mode, options.threshold);
        rendered.push(out);
      }
      return assemblePdf(rendered, options.printDpi);
    });

    await fs.mkdir(workDir, { recursive: true });
    const outPath = path.join(workDir, `print-${uuidv4()}.pdf`);
    await fs.writeFile(outPath, pdfBytes);
    logger.debug({ source: filePath, pages, mode: options.mode }, 'Print file prepared');

    return {
      path: outPath,
      prepared: true,
      pages,
      cleanup: () => fs.rm(outPath, { force: true }),
    };
  }

  return { renderPreview, preparePrintFile };
}

import type { AppConfig } from '../models/config.model';
import type { ResolvedPrintRequest } from '../validators/print.validator';
import { logger } from '../utils/logger';
import type { PrinterGateway } from './cups.service';
import type { Renderer } from './render.service';
import type { UploadStore } from './upload.service';

export interface PrintServiceDeps {
  readonly uploads: UploadStore;
  readonly renderer: Renderer;
  readonly gateway: PrinterGateway;
  readonly getConfig: () => AppConfig;
}

export interface PrintService {
  /** Prepare the upload for its mode and hand it to `lp`; resolves to lp's stdout */
  submit(request: ResolvedPrintRequest): Promise<string>;
}

export function createPrintService(deps: PrintServiceDeps): PrintService {
  return {
    async submit(request) {
      const sourcePath = await deps.uploads.resolve(request.filename);
      const { printing } = deps.getConfig();

      const prepared = await deps.renderer.preparePrintFile(sourcePath, {
        mode: request.mode,
        printDpi: printing.print_dpi,
        maxPdfPages: printing.max_pdf_pages_process,
        threshold: printing.bw_threshold,
      });

      try {
        const result = await deps.gateway.printFile(prepared.path, {
          printer: request.printer,
          copies: request.copies,
          title: `PrinterPal: ${request.filename}`,
          timeoutMs: 60_000,
        });
        logger.info(
          { filename: request.filename, mode: request.mode, pages: prepared.pages, printer: request.printer ?? '(system default)' },
          'Print job queued'
        );
        return result.stdout.trim();
      } finally {
        await prepared.cleanup();
      }
    },
  };
}

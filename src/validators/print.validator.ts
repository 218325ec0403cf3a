import { z } from 'zod';
import type { PrintingConfig } from '../models/config.model';
import { PRINT_MODES, type PrintMode } from '../models/print-job.model';
import { PrinterPalError } from '../utils/errors';

export const printRequestSchema = z.object({
  filename: z.string({ required_error: 'filename required' }).trim().min(1, 'filename required'),
  mode: z.string().optional(),
  printer: z.string().optional(),
  copies: z.number().int('copies must be an integer').optional(),
});

export type PrintRequest = z.infer<typeof printRequestSchema>;

export interface ResolvedPrintRequest {
  readonly filename: string;
  readonly mode: PrintMode;
  /** null means the CUPS system default */
  readonly printer: string | null;
  readonly copies: number;
}

export function isPrintMode(value: string): value is PrintMode {
  return PRINT_MODES.some((mode) => mode === value);
}

/** Apply config defaults to a print request and check the values */
export function resolvePrintRequest(body: unknown, printing: PrintingConfig): ResolvedPrintRequest {
  const parsed = printRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new PrinterPalError(parsed.error.issues[0]?.message ?? 'Invalid JSON', 400);
  }

  const mode = (parsed.data.mode || printing.default_mode).trim().toLowerCase();
  if (!isPrintMode(mode)) {
    throw new PrinterPalError(`Unsupported mode: ${mode}`, 400);
  }

  const copies = parsed.data.copies ?? printing.default_copies;
  if (copies < 1 || copies > 99) {
    throw new PrinterPalError('copies must be between 1 and 99', 400);
  }

  return {
    filename: parsed.data.filename,
    mode,
    printer: parsed.data.printer?.trim() || null,
    copies,
  };
}

import type { PrintRequestBody } from '../models/print-job.model';

export interface PrintFormValues {
  readonly mode: string;
  readonly page: string;
  readonly copies: string;
  readonly printer: string;
}

export type PrintFormResult =
  | { readonly ok: true; readonly body: PrintRequestBody; readonly page: number }
  | { readonly ok: false; readonly error: string };

const INTEGER_RE = /^\d+$/;

/**
 * Check the print form before anything goes over the network. An empty
 * page or copies field means 1; an empty printer means the system default.
 */
export function validatePrintForm(
  filename: string,
  values: PrintFormValues,
  knownPrinters: readonly string[]
): PrintFormResult {
  const pageText = values.page.trim() || '1';
  const page = INTEGER_RE.test(pageText) ? parseInt(pageText, 10) : NaN;
  if (!Number.isInteger(page) || page < 1) {
    return { ok: false, error: 'Invalid page number.' };
  }

  const copiesText = values.copies.trim() || '1';
  const copies = INTEGER_RE.test(copiesText) ? parseInt(copiesText, 10) : NaN;
  if (!Number.isInteger(copies) || copies < 1 || copies > 99) {
    return { ok: false, error: 'Copies must be 1–99.' };
  }

  const printer = values.printer.trim();
  if (printer && !knownPrinters.includes(printer)) {
    return { ok: false, error: `Unknown printer: ${printer}` };
  }

  return { ok: true, page, body: { filename, mode: values.mode, printer, copies } };
}

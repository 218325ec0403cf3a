import { z } from 'zod';
import { type AppConfig, defaultConfig } from '../models/config.model';
import { PRINT_MODES } from '../models/print-job.model';
import { PrinterPalError } from '../utils/errors';

function intField(name: string, min: number, max: number) {
  const range = `${name} must be between ${min} and ${max}`;
  return z
    .number({ invalid_type_error: `${name} must be a number`, required_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(min, range)
    .max(max, range);
}

function boolField(name: string) {
  return z.boolean({ invalid_type_error: `${name} must be boolean`, required_error: `${name} must be boolean` });
}

function stringField(name: string) {
  return z.string({ invalid_type_error: `${name} must be string`, required_error: `${name} must be string` });
}

export const appConfigSchema: z.ZodType<AppConfig> = z.object({
  app: z.object({
    max_upload_mb: intField('app.max_upload_mb', 1, 500),
  }),
  printing: z.object({
    default_printer: stringField('printing.default_printer').trim(),
    preview_dpi: intField('printing.preview_dpi', 72, 600),
    print_dpi: intField('printing.print_dpi', 72, 1200),
    bw_threshold: intField('printing.bw_threshold', 1, 254),
    max_pdf_pages_process: intField('printing.max_pdf_pages_process', 1, 500),
    default_mode: z.enum(PRINT_MODES, {
      errorMap: () => ({ message: `printing.default_mode must be one of ${PRINT_MODES.join('|')}` }),
    }),
    default_copies: intField('printing.default_copies', 1, 99),
  }),
  airprint: z.object({
    auto_enable: boolField('airprint.auto_enable'),
  }),
  ui: z.object({
    default_dark_mode: boolField('ui.default_dark_mode'),
    default_eink_mode: boolField('ui.default_eink_mode'),
  }),
  security: z.object({
    require_token: boolField('security.require_token'),
    token: stringField('security.token'),
  }),
});

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Recursively overlay `override` onto `base`; arrays and scalars replace */
export function deepMerge(base: object, override: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

/**
 * Fill missing keys from the defaults and validate. Unknown keys are dropped.
 * Throws PrinterPalError (400) naming the first offending field.
 */
export function normalizeConfig(input: unknown): AppConfig {
  if (!isPlainObject(input)) {
    throw new PrinterPalError('config must be an object', 400);
  }

  const result = appConfigSchema.safeParse(deepMerge(defaultConfig(), input));
  if (!result.success) {
    throw new PrinterPalError(result.error.issues[0]?.message ?? 'Invalid config', 400);
  }
  return result.data;
}

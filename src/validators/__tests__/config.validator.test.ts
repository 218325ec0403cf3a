import { describe, it, expect } from 'vitest';
import { defaultConfig } from '../../models/config.model';
import { PrinterPalError } from '../../utils/errors';
import { deepMerge, normalizeConfig } from '../config.validator';

function rejection(input: unknown): PrinterPalError {
  try {
    normalizeConfig(input);
  } catch (error) {
    if (error instanceof PrinterPalError) return error;
    throw error;
  }
  throw new Error('expected normalizeConfig to throw');
}

describe('normalizeConfig', () => {
  it('should fill every missing key from the defaults', () => {
    expect(normalizeConfig({})).toEqual(defaultConfig());
  });

  it('should keep valid overrides and trim the default printer', () => {
    const config = normalizeConfig({ printing: { default_printer: '  Office_Laser  ', preview_dpi: 300 } });
    expect(config.printing.default_printer).toBe('Office_Laser');
    expect(config.printing.preview_dpi).toBe(300);
    expect(config.printing.print_dpi).toBe(200);
  });

  it('should drop unknown keys', () => {
    const config = normalizeConfig({ extra: true, printing: { colour: 'red' } });
    expect(Object.keys(config)).toEqual(['app', 'printing', 'airprint', 'ui', 'security']);
    expect('colour' in config.printing).toBe(false);
  });

  it('should reject non-objects', () => {
    for (const input of [null, [], 'config', 42]) {
      const error = rejection(input);
      expect(error.message).toBe('config must be an object');
      expect(error.statusCode).toBe(400);
    }
  });

  it('should reject out-of-range values instead of clamping them', () => {
    expect(rejection({ printing: { preview_dpi: 700 } }).message).toBe(
      'printing.preview_dpi must be between 72 and 600'
    );
    expect(rejection({ printing: { bw_threshold: 0 } }).message).toBe(
      'printing.bw_threshold must be between 1 and 254'
    );
    expect(rejection({ app: { max_upload_mb: 501 } }).message).toBe('app.max_upload_mb must be between 1 and 500');
  });

  it('should name the field for wrong types', () => {
    expect(rejection({ printing: { print_dpi: '300' } }).message).toBe('printing.print_dpi must be a number');
    expect(rejection({ printing: { print_dpi: 150.5 } }).message).toBe('printing.print_dpi must be an integer');
    expect(rejection({ airprint: { auto_enable: 'yes' } }).message).toBe('airprint.auto_enable must be boolean');
  });

  it('should reject unknown print modes', () => {
    expect(rejection({ printing: { default_mode: 'sepia' } }).message).toBe(
      'printing.default_mode must be one of raw|grayscale|bw|dither|outline'
    );
  });
});

describe('deepMerge', () => {
  it('should merge nested objects and replace scalars and arrays', () => {
    const merged = deepMerge({ a: { x: 1, y: 2 }, list: [1, 2], keep: 'yes' }, { a: { y: 3 }, list: [9] });
    expect(merged).toEqual({ a: { x: 1, y: 3 }, list: [9], keep: 'yes' });
  });

  it('should not mutate the base object', () => {
    const base = { a: { x: 1 } };
    deepMerge(base, { a: { x: 2 } });
    expect(base).toEqual({ a: { x: 1 } });
  });
});

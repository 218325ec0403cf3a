import { describe, it, expect } from 'vitest';
import { type PrintFormValues, validatePrintForm } from '../validation';

const form: PrintFormValues = { mode: 'grayscale', page: '1', copies: '1', printer: '' };

describe('validatePrintForm', () => {
  it('should build the print body from the form', () => {
    expect(
      validatePrintForm('a.pdf', { mode: 'dither', page: '3', copies: '2', printer: 'Office_Laser' }, ['Office_Laser'])
    ).toEqual({
      ok: true,
      page: 3,
      body: { filename: 'a.pdf', mode: 'dither', printer: 'Office_Laser', copies: 2 },
    });
  });

  it('should treat empty page and copies as 1', () => {
    const result = validatePrintForm('a.pdf', { ...form, page: ' ', copies: '' }, []);
    expect(result).toEqual({ ok: true, page: 1, body: { filename: 'a.pdf', mode: 'grayscale', printer: '', copies: 1 } });
  });

  it('should reject bad page numbers', () => {
    for (const page of ['0', '-1', '2.5', 'two']) {
      expect(validatePrintForm('a.pdf', { ...form, page }, [])).toEqual({ ok: false, error: 'Invalid page number.' });
    }
  });

  it('should reject copies outside 1..99', () => {
    for (const copies of ['0', '100', '1e2']) {
      expect(validatePrintForm('a.pdf', { ...form, copies }, [])).toEqual({ ok: false, error: 'Copies must be 1–99.' });
    }
  });

  it('should reject printers the server did not list', () => {
    expect(validatePrintForm('a.pdf', { ...form, printer: 'Ghost' }, ['Office_Laser'])).toEqual({
      ok: false,
      error: 'Unknown printer: Ghost',
    });
  });
});

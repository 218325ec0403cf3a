// @vitest-environment jsdom
import fs from 'fs';
import path from 'path';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { defaultConfig } from '../../models/config.model';
import { OFFICE_LASER, QUEUED_JOB, statusUpdate } from '../../services/__tests__/fakes';
import { createDomView } from '../dom-view';
import type { SessionCommand } from '../session-controller';

const PAGE = fs.readFileSync(path.join(process.cwd(), 'client', 'index.html'), 'utf8');

function byId(id: string): HTMLElement {
  const el = document.getElementById(id);
  if (!el) throw new Error(`no #${id} in page`);
  return el;
}

function find(selector: string): HTMLElement {
  const el = document.querySelector<HTMLElement>(selector);
  if (!el) throw new Error(`nothing matches ${selector}`);
  return el;
}

function optionTexts(): string[] {
  return Array.from(document.querySelectorAll('#ppPrinterSelect option')).map((o) => o.textContent ?? '');
}

function printerValue(): string {
  const select = byId('ppPrinterSelect');
  if (!(select instanceof HTMLSelectElement)) throw new Error('printer select is not a select');
  return select.value;
}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('dom view', () => {
  beforeEach(() => {
    document.body.innerHTML = new DOMParser().parseFromString(PAGE, 'text/html').body.innerHTML;
    document.body.className = '';
  });

  it('should refuse a page without the expected elements', () => {
    document.body.innerHTML = '<div></div>';
    expect(() => createDomView()).toThrow('Missing element #ppFileList');
  });

  describe('files', () => {
    it('should render one row per file without duplicating on repeat renders', () => {
      const view = createDomView();
      const { files } = statusUpdate();

      view.renderFiles(files, null);
      view.renderFiles(files, 'invoice.pdf');

      const rows = document.querySelectorAll('.pp-file');
      expect(rows).toHaveLength(1);
      expect(rows[0].classList.contains('selected')).toBe(true);
      expect(find('.pp-file-name').textContent).toBe('invoice.pdf');
      expect(find('.pp-file a').getAttribute('href')).toBe('/uploads/invoice.pdf');
      expect(find('.pp-file-delete').dataset.delete).toBe('invoice.pdf');
    });

    it('should say when there are no uploads', () => {
      const view = createDomView();
      view.renderFiles([], null);
      expect(byId('ppFileList').textContent).toBe('No uploads yet.');
    });
  });

  describe('status', () => {
    it('should render printers, counters and the queue', () => {
      const view = createDomView();

      view.renderStatus(statusUpdate().status, '');

      expect(byId('ppCupsStatus').textContent).toBe('Available');
      expect(byId('ppDefaultPrinter').textContent).toBe('Second floor laser (default)');
      expect(byId('ppActiveJobs').textContent).toBe('1');
      expect(byId('ppCompletedJobs').textContent).toBe('2');
      expect(optionTexts()).toEqual(['System default (Office_Laser)', 'Second floor laser • idle']);
      expect(printerValue()).toBe('');
      expect(find('.pp-queue-item').textContent).toBe(QUEUED_JOB.raw);
    });

    it('should show an unavailable CUPS with an empty queue', () => {
      const view = createDomView();
      const { status } = statusUpdate();

      view.renderStatus(
        {
          ...status,
          cups_available: false,
          default_printer: '',
          default_printer_label: '',
          default_printer_display: '',
          printers: [{ ...OFFICE_LASER, display_name: null, accepting: false }],
          jobs: [],
          stats: { active_jobs: 0, completed_jobs: 0, last_completed_raw: '' },
        },
        ''
      );

      expect(byId('ppCupsStatus').textContent).toBe('Not available');
      expect(byId('ppDefaultPrinter').textContent).toBe('—');
      expect(byId('ppActiveJobs').textContent).toBe('0');
      expect(optionTexts()).toEqual(['System default', 'Office_Laser • idle • not accepting']);
      expect(byId('ppQueue').textContent).toBe('Queue is empty.');
    });

    it('should preselect the configured printer until the user picks one', () => {
      const view = createDomView();
      view.bind(vi.fn(async (_command: SessionCommand) => undefined));
      const { status } = statusUpdate();

      view.renderStatus(status, 'Office_Laser');
      expect(printerValue()).toBe('Office_Laser');

      view.renderStatus(status, 'Gone_Printer');
      expect(printerValue()).toBe('');

      const select = byId('ppPrinterSelect');
      if (!(select instanceof HTMLSelectElement)) throw new Error('printer select is not a select');
      select.value = 'Office_Laser';
      select.dispatchEvent(new Event('change'));
      view.renderStatus(status, '');
      expect(printerValue()).toBe('Office_Laser');
    });
  });

  describe('forms', () => {
    it('should fill and read back the settings and print forms', () => {
      const view = createDomView();

      view.populateSettings(defaultConfig());
      view.seedPrintForm(defaultConfig().printing);

      expect(view.readSettingsForm()).toEqual({
        default_printer: '',
        preview_dpi: '150',
        print_dpi: '200',
        bw_threshold: '180',
        max_pdf_pages_process: '30',
        auto_enable: true,
      });
      expect(view.readPrintForm()).toEqual({ mode: 'grayscale', page: '1', copies: '1', printer: '' });
    });

    it('should not touch the print controls when refilling settings', () => {
      const view = createDomView();
      view.seedPrintForm(defaultConfig().printing);
      const mode = byId('ppModeSelect');
      const copies = byId('ppCopiesInput');
      if (!(mode instanceof HTMLSelectElement) || !(copies instanceof HTMLInputElement)) {
        throw new Error('print controls have the wrong element types');
      }
      mode.value = 'bw';
      copies.value = '3';

      view.populateSettings(defaultConfig());

      expect(view.readPrintForm()).toEqual({ mode: 'bw', page: '1', copies: '3', printer: '' });
    });
  });

  describe('bind', () => {
    it('should turn clicks into commands', () => {
      const view = createDomView();
      const dispatch = vi.fn(async (_command: SessionCommand) => undefined);
      view.bind(dispatch);
      view.renderFiles(statusUpdate().files, null);

      find('.pp-file-name').click();
      find('.pp-file-delete').click();
      const download = find('.pp-file a');
      download.addEventListener('click', (ev) => ev.preventDefault());
      download.dispatchEvent(new MouseEvent('click', { bubbles: true, cancelable: true }));
      view.setPrintEnabled(true);
      byId('ppPrintBtn').click();
      byId('ppRefreshFiles').click();

      expect(dispatch.mock.calls.map(([command]) => command)).toEqual([
        { type: 'select-file', name: 'invoice.pdf' },
        { type: 'delete-file', name: 'invoice.pdf' },
        { type: 'print' },
        { type: 'refresh' },
      ]);
    });

    it('should select a row with Enter', () => {
      const view = createDomView();
      const dispatch = vi.fn(async (_command: SessionCommand) => undefined);
      view.bind(dispatch);
      view.renderFiles(statusUpdate().files, null);

      find('.pp-file').dispatchEvent(new KeyboardEvent('keydown', { key: 'Enter', bubbles: true }));

      expect(dispatch).toHaveBeenCalledWith({ type: 'select-file', name: 'invoice.pdf' });
    });

    it('should open and close the menu', () => {
      const view = createDomView();
      const dispatch = vi.fn(async (_command: SessionCommand) => undefined);
      view.bind(dispatch);

      byId('ppMenuButton').click();
      expect(byId('ppMenuDropdown').classList.contains('open')).toBe(true);
      expect(byId('ppMenuButton').getAttribute('aria-expanded')).toBe('true');

      byId('ppMenuDarkMode').click();
      expect(byId('ppMenuDropdown').classList.contains('open')).toBe(true);

      byId('ppMenuRestartHost').click();
      expect(byId('ppMenuDropdown').classList.contains('open')).toBe(false);
      expect(dispatch.mock.calls.map(([command]) => command)).toEqual([{ type: 'toggle-dark' }, { type: 'restart' }]);

      byId('ppMenuButton').click();
      document.body.click();
      expect(byId('ppMenuDropdown').classList.contains('open')).toBe(false);
    });

    it('should toggle the settings panel', () => {
      const view = createDomView();
      view.bind(vi.fn(async (_command: SessionCommand) => undefined));

      byId('ppOpenSettings').click();
      expect(byId('ppSettingsPanel').hidden).toBe(false);
      byId('ppCloseSettings').click();
      expect(byId('ppSettingsPanel').hidden).toBe(true);
    });

    it('should show a rejected command as an error', async () => {
      const view = createDomView();
      view.bind(
        vi.fn(async (_command: SessionCommand) => {
          throw new Error('socket closed');
        })
      );

      byId('ppRefreshFiles').click();
      await flush();

      expect(byId('ppActionMsg').textContent).toBe('socket closed');
      expect(byId('ppActionMsg').classList.contains('pp-msg-error')).toBe(true);
    });
  });

  describe('display', () => {
    it('should apply dark and e-ink classes', () => {
      const view = createDomView();

      view.applyPreferences({ dark: true, eink: false });
      expect(document.body.classList.contains('mode-dark')).toBe(true);
      expect(byId('ppMenuDarkMode').getAttribute('aria-checked')).toBe('true');

      view.applyPreferences({ dark: false, eink: true });
      expect(document.body.classList.contains('mode-dark')).toBe(false);
      expect(document.body.classList.contains('mode-eink')).toBe(true);
      expect(byId('ppMenuEinkMode').getAttribute('aria-checked')).toBe('true');
    });

    it('should clear the error style on a plain message', () => {
      const view = createDomView();

      view.showMessage('settings', 'Save failed: 400', true);
      view.showMessage('settings', 'Saved.', false);

      expect(byId('ppSettingsMsg').textContent).toBe('Saved.');
      expect(byId('ppSettingsMsg').classList.contains('pp-msg-error')).toBe(false);
    });

    it('should drop the image source when the preview is cleared', () => {
      const view = createDomView();
      view.loadPreview('/api/preview/invoice.pdf?mode=bw&page=1&w=720&_=1');
      view.setPreviewVisible(true);

      view.clearPreview();

      expect(byId('ppPreviewImg').hasAttribute('src')).toBe(false);
      expect(byId('ppPreviewImg').style.display).toBe('none');
      expect(byId('ppPreviewPlaceholder').style.display).toBe('block');
    });

    it('should swap the placeholder and the preview image', () => {
      const view = createDomView();

      view.setPreviewVisible(true);

      expect(byId('ppPreviewImg').style.display).toBe('block');
      expect(byId('ppPreviewPlaceholder').style.display).toBe('none');
    });
  });
});

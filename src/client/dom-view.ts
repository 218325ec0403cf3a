import type { AppConfig } from '../models/config.model';
import type { PrinterInfo, QueueJob, StatusSnapshot, UploadedFile } from '../models/status.model';
import type { DisplayPreferences } from './preferences';
import type { SessionCommand } from './session-controller';
import type { PrintFormValues } from './validation';
import type { MessagePanel, SessionView, SettingsFormValues } from './view';

export type Dispatch = (command: SessionCommand) => Promise<void>;

export interface DomView extends SessionView {
  /** Route user events on the page to `dispatch` */
  bind(dispatch: Dispatch): void;
}

function formatTime(ts: number): string {
  return new Date(ts * 1000).toLocaleString();
}

function printerLabel(printer: PrinterInfo): string {
  const accepting = printer.accepting === false ? ' • not accepting' : '';
  return `${printer.display_name ?? printer.name} • ${printer.state}${accepting}`;
}

export function createDomView(doc: Document = document, win: Window = window): DomView {
  function element<T extends HTMLElement>(id: string, type: { new (): T; prototype: T }): T {
    const el = doc.getElementById(id);
    if (!(el instanceof type)) {
      throw new Error(`Missing element #${id}`);
    }
    return el;
  }

  const fileList = element('ppFileList', HTMLElement);
  const printBtn = element('ppPrintBtn', HTMLButtonElement);
  const refreshBtn = element('ppRefreshFiles', HTMLButtonElement);
  const previewImg = element('ppPreviewImg', HTMLImageElement);
  const previewPlaceholder = element('ppPreviewPlaceholder', HTMLElement);
  const cupsStatus = element('ppCupsStatus', HTMLElement);
  const defaultPrinter = element('ppDefaultPrinter', HTMLElement);
  const activeJobs = element('ppActiveJobs', HTMLElement);
  const completedJobs = element('ppCompletedJobs', HTMLElement);
  const printerSelect = element('ppPrinterSelect', HTMLSelectElement);
  const queue = element('ppQueue', HTMLElement);
  const modeSelect = element('ppModeSelect', HTMLSelectElement);
  const pageInput = element('ppPageInput', HTMLInputElement);
  const copiesInput = element('ppCopiesInput', HTMLInputElement);
  const footer = element('ppFooterStatus', HTMLElement);
  const messages: Record<MessagePanel, HTMLElement> = {
    action: element('ppActionMsg', HTMLElement),
    settings: element('ppSettingsMsg', HTMLElement),
  };

  const settingsPanel = element('ppSettingsPanel', HTMLElement);
  const cfgDefaultPrinter = element('ppCfgDefaultPrinter', HTMLInputElement);
  const cfgPreviewDpi = element('ppCfgPreviewDpi', HTMLInputElement);
  const cfgPrintDpi = element('ppCfgPrintDpi', HTMLInputElement);
  const cfgThreshold = element('ppCfgThreshold', HTMLInputElement);
  const cfgMaxPages = element('ppCfgMaxPages', HTMLInputElement);
  const cfgAirPrint = element('ppCfgAirPrint', HTMLInputElement);

  const menuButton = element('ppMenuButton', HTMLButtonElement);
  const menuDropdown = element('ppMenuDropdown', HTMLElement);
  const menuDark = element('ppMenuDarkMode', HTMLElement);
  const menuEink = element('ppMenuEinkMode', HTMLElement);

  // Set once the user picks a printer; until then the configured default is shown
  let printerTouched = false;

  function showMessage(panel: MessagePanel, text: string, isError: boolean): void {
    const el = messages[panel];
    el.textContent = text;
    el.classList.toggle('pp-msg-error', isError);
  }

  function setPreviewVisible(visible: boolean): void {
    previewImg.style.display = visible ? 'block' : 'none';
    previewPlaceholder.style.display = visible ? 'none' : 'block';
  }

  function setMenuOpen(open: boolean): void {
    menuDropdown.classList.toggle('open', open);
    menuButton.setAttribute('aria-expanded', open ? 'true' : 'false');
  }

  function muted(text: string): HTMLElement {
    const el = doc.createElement('div');
    el.className = 'pp-muted';
    el.textContent = text;
    return el;
  }

  function fileRow(file: UploadedFile, selected: boolean): HTMLElement {
    const row = doc.createElement('div');
    row.className = selected ? 'pp-file selected' : 'pp-file';
    row.setAttribute('role', 'listitem');
    row.dataset.name = file.name;
    row.tabIndex = 0;

    const left = doc.createElement('div');
    const name = doc.createElement('div');
    name.className = 'pp-file-name';
    name.textContent = file.name;
    const meta = doc.createElement('div');
    meta.className = 'pp-file-meta';
    meta.textContent = `${file.size_h} • ${formatTime(file.mtime)}`;
    left.append(name, meta);

    const right = doc.createElement('div');
    right.className = 'pp-file-actions';
    const download = doc.createElement('a');
    download.href = `/uploads/${encodeURIComponent(file.name)}`;
    download.textContent = 'Download';
    download.className = 'pp-file-meta';
    const remove = doc.createElement('button');
    remove.type = 'button';
    remove.className = 'pp-link pp-file-delete';
    remove.dataset.delete = file.name;
    remove.textContent = 'Delete';
    right.append(download, remove);

    row.append(left, right);
    return row;
  }

  function renderPrinters(status: StatusSnapshot, preferred: string): void {
    const current = printerSelect.value;
    printerSelect.replaceChildren();

    const auto = doc.createElement('option');
    auto.value = '';
    auto.textContent = status.default_printer ? `System default (${status.default_printer})` : 'System default';
    printerSelect.append(auto);

    for (const printer of status.printers) {
      const opt = doc.createElement('option');
      opt.value = printer.name;
      opt.textContent = printerLabel(printer);
      printerSelect.append(opt);
    }

    const wanted = printerTouched ? current : preferred;
    const known = status.printers.some((p) => p.name === wanted);
    printerSelect.value = known ? wanted : '';
  }

  function queueItem(job: QueueJob): HTMLElement {
    const item = doc.createElement('div');
    item.className = 'pp-queue-item';
    item.textContent = job.raw || String(job.job_id);
    return item;
  }

  function bind(dispatch: Dispatch): void {
    const run = (command: SessionCommand) => {
      dispatch(command).catch((error: unknown) => {
        showMessage('action', error instanceof Error ? error.message : String(error), true);
      });
    };

    fileList.addEventListener('click', (ev) => {
      const target = ev.target;
      if (!(target instanceof HTMLElement)) return;
      if (target.closest('a')) return;
      const remove = target.closest<HTMLElement>('[data-delete]');
      if (remove?.dataset.delete) {
        run({ type: 'delete-file', name: remove.dataset.delete });
        return;
      }
      const row = target.closest<HTMLElement>('.pp-file');
      if (row?.dataset.name) run({ type: 'select-file', name: row.dataset.name });
    });
    fileList.addEventListener('keydown', (ev) => {
      const target = ev.target;
      if (ev.key !== 'Enter' || !(target instanceof HTMLElement)) return;
      if (target.classList.contains('pp-file') && target.dataset.name) {
        run({ type: 'select-file', name: target.dataset.name });
      }
    });

    printBtn.addEventListener('click', () => run({ type: 'print' }));
    refreshBtn.addEventListener('click', () => run({ type: 'refresh' }));
    modeSelect.addEventListener('change', () => run({ type: 'preview-changed' }));
    pageInput.addEventListener('change', () => run({ type: 'preview-changed' }));
    printerSelect.addEventListener('change', () => {
      printerTouched = true;
    });
    previewImg.addEventListener('load', () => run({ type: 'preview-loaded' }));
    previewImg.addEventListener('error', () => run({ type: 'preview-failed' }));
    win.addEventListener('resize', () => run({ type: 'resize' }));

    menuButton.addEventListener('click', (ev) => {
      ev.stopPropagation();
      setMenuOpen(!menuDropdown.classList.contains('open'));
    });
    doc.addEventListener('click', () => setMenuOpen(false));

    const menuItem = (id: string, command: SessionCommand, closeMenu: boolean) => {
      element(id, HTMLElement).addEventListener('click', (ev) => {
        ev.stopPropagation();
        if (closeMenu) setMenuOpen(false);
        run(command);
      });
    };
    menuItem('ppMenuDarkMode', { type: 'toggle-dark' }, false);
    menuItem('ppMenuEinkMode', { type: 'toggle-eink' }, false);
    menuItem('ppMenuRestartHost', { type: 'restart' }, true);
    menuItem('ppMenuEnsureAirPrint', { type: 'ensure-airprint' }, true);

    element('ppOpenSettings', HTMLElement).addEventListener('click', () => {
      settingsPanel.hidden = !settingsPanel.hidden;
    });
    element('ppCloseSettings', HTMLElement).addEventListener('click', () => {
      settingsPanel.hidden = true;
    });
    element('ppSaveSettings', HTMLElement).addEventListener('click', () => run({ type: 'save-config' }));
  }

  return {
    bind,

    renderFiles(files, selected) {
      if (files.length === 0) {
        fileList.replaceChildren(muted('No uploads yet.'));
        return;
      }
      fileList.replaceChildren(...files.map((f) => fileRow(f, f.name === selected)));
    },

    renderStatus(status, preferredPrinter) {
      cupsStatus.textContent = status.cups_available ? 'Available' : 'Not available';
      defaultPrinter.textContent = status.default_printer_label || status.default_printer || '—';
      activeJobs.textContent = String(status.stats.active_jobs);
      completedJobs.textContent = String(status.stats.completed_jobs);
      renderPrinters(status, preferredPrinter);
      queue.replaceChildren(...(status.jobs.length ? status.jobs.map(queueItem) : [muted('Queue is empty.')]));
    },

    populateSettings(config: AppConfig) {
      const { printing, airprint } = config;
      cfgDefaultPrinter.value = printing.default_printer;
      cfgPreviewDpi.value = String(printing.preview_dpi);
      cfgPrintDpi.value = String(printing.print_dpi);
      cfgThreshold.value = String(printing.bw_threshold);
      cfgMaxPages.value = String(printing.max_pdf_pages_process);
      cfgAirPrint.checked = airprint.auto_enable;
    },

    seedPrintForm(printing) {
      modeSelect.value = printing.default_mode;
      copiesInput.value = String(printing.default_copies);
    },

    readPrintForm(): PrintFormValues {
      return {
        mode: modeSelect.value,
        page: pageInput.value,
        copies: copiesInput.value,
        printer: printerSelect.value,
      };
    },

    readSettingsForm(): SettingsFormValues {
      return {
        default_printer: cfgDefaultPrinter.value,
        preview_dpi: cfgPreviewDpi.value,
        print_dpi: cfgPrintDpi.value,
        bw_threshold: cfgThreshold.value,
        max_pdf_pages_process: cfgMaxPages.value,
        auto_enable: cfgAirPrint.checked,
      };
    },

    setPrintEnabled(enabled) {
      printBtn.disabled = !enabled;
    },

    showMessage,

    setFooterStatus(text) {
      footer.textContent = text;
    },

    loadPreview(url) {
      previewImg.src = url;
    },

    setPreviewVisible,

    clearPreview() {
      previewImg.removeAttribute('src');
      setPreviewVisible(false);
    },

    previewContainerWidth() {
      return previewImg.parentElement?.clientWidth;
    },

    confirm(question) {
      return win.confirm(question);
    },

    applyPreferences(preferences: DisplayPreferences) {
      doc.body.classList.toggle('mode-dark', preferences.dark && !preferences.eink);
      doc.body.classList.toggle('mode-eink', preferences.eink);
      menuDark.setAttribute('aria-checked', preferences.dark ? 'true' : 'false');
      menuEink.setAttribute('aria-checked', preferences.eink ? 'true' : 'false');
    },
  };
}

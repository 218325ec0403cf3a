import type { AppConfig } from '../models/config.model';
import type { StatusSnapshot, StatusUpdate, UploadedFile } from '../models/status.model';
import type { ApiClient } from './api-client';
import { type ChannelState, type LiveChannelHandlers, type Subscription, subscribeToStatus } from './live-channel';
import {
  type KeyValueStore,
  hasStoredPreferences,
  loadPreferences,
  savePreferences,
  toggleDark,
  toggleEink,
} from './preferences';
import { buildPreviewUrl, computePreviewWidth, createCacheBuster, debounce } from './preview';
import { type FooterStatus, type SessionState, createSessionState, reconcileSelection } from './session-state';
import { validatePrintForm } from './validation';
import type { SessionView, SettingsFormValues } from './view';

export type SessionCommand =
  | { readonly type: 'select-file'; readonly name: string }
  | { readonly type: 'print' }
  | { readonly type: 'refresh' }
  | { readonly type: 'save-config' }
  | { readonly type: 'restart' }
  | { readonly type: 'ensure-airprint' }
  | { readonly type: 'delete-file'; readonly name: string }
  | { readonly type: 'preview-changed' }
  | { readonly type: 'resize' }
  | { readonly type: 'preview-loaded' }
  | { readonly type: 'preview-failed' }
  | { readonly type: 'toggle-dark' }
  | { readonly type: 'toggle-eink' };

export interface SessionControllerDeps {
  readonly api: ApiClient;
  readonly view: SessionView;
  readonly preferences: KeyValueStore;
  readonly subscribe?: (handlers: LiveChannelHandlers) => Subscription;
  readonly cacheBuster?: () => string;
  readonly resizeDebounceMs?: number;
}

export interface SessionController {
  readonly state: Readonly<SessionState>;
  /** Pull everything once, then open the live channel */
  start(): Promise<void>;
  dispatch(command: SessionCommand): Promise<void>;
  stop(): void;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Copy of `config` with only the fields the settings form exposes replaced.
 * Numbers are converted as typed; "1.5" or "150abc" reach the server as-is for it to reject.
 */
export function overlaySettings(config: AppConfig, form: SettingsFormValues): AppConfig {
  return {
    ...config,
    printing: {
      ...config.printing,
      default_printer: form.default_printer.trim(),
      preview_dpi: Number(form.preview_dpi),
      print_dpi: Number(form.print_dpi),
      bw_threshold: Number(form.bw_threshold),
      max_pdf_pages_process: Number(form.max_pdf_pages_process),
    },
    airprint: { ...config.airprint, auto_enable: form.auto_enable },
  };
}

export function createSessionController(deps: SessionControllerDeps): SessionController {
  const { api, view } = deps;
  const subscribe = deps.subscribe ?? ((handlers: LiveChannelHandlers) => subscribeToStatus(handlers));
  const nextToken = deps.cacheBuster ?? createCacheBuster();
  const state = createSessionState(loadPreferences(deps.preferences));
  let subscription: Subscription | null = null;

  function setFooter(footer: FooterStatus): void {
    state.footer = footer;
    view.setFooterStatus(footer);
  }

  // --- reconciliation ------------------------------------------------------

  function applyFiles(files: readonly UploadedFile[]): void {
    state.files = files;
    const selected = reconcileSelection(state.selectedFile, files);
    if (state.selectedFile !== null && selected === null) {
      state.selectedFile = null;
      view.setPrintEnabled(false);
      view.clearPreview();
    }
    view.renderFiles(files, state.selectedFile);
  }

  function applyStatus(status: StatusSnapshot): void {
    state.status = status;
    view.renderStatus(status, state.config?.printing.default_printer ?? '');
  }

  function applyConfig(config: AppConfig): void {
    state.config = config;
    view.populateSettings(config);
  }

  function applyUpdate(update: StatusUpdate): void {
    applyFiles(update.files);
    applyStatus(update.status);
  }

  async function refreshAll(): Promise<void> {
    const [files, status, cfg] = await Promise.all([api.getFiles(), api.getStatus(), api.getConfig()]);
    applyConfig(cfg.config);
    applyFiles(files.files);
    applyStatus(status);
    setFooter('Live');
  }

  async function refreshStatus(): Promise<void> {
    applyStatus(await api.getStatus());
  }

  async function refreshFiles(): Promise<void> {
    applyFiles((await api.getFiles()).files);
  }

  // --- live channel --------------------------------------------------------

  function onChannelState(channelState: ChannelState): void {
    if (channelState === 'live') setFooter('Live');
    else if (channelState === 'reconnecting') setFooter('Reconnecting…');
  }

  function openLiveChannel(): void {
    try {
      subscription = subscribe({ onUpdate: applyUpdate, onStateChange: onChannelState });
    } catch {
      setFooter('No live updates');
    }
  }

  // --- preview -------------------------------------------------------------

  function updatePreview(): void {
    if (state.selectedFile === null) {
      view.clearPreview();
      return;
    }
    const form = view.readPrintForm();
    const page = Math.max(1, parseInt(form.page, 10) || 1);
    const width = computePreviewWidth(view.previewContainerWidth());
    view.loadPreview(buildPreviewUrl({ filename: state.selectedFile, mode: form.mode, page, width }, nextToken()));
  }

  const resizePreview = debounce(updatePreview, deps.resizeDebounceMs ?? 120);

  // --- commands ------------------------------------------------------------

  function selectFile(name: string): void {
    if (!state.files.some((f) => f.name === name)) return;
    state.selectedFile = name;
    view.renderFiles(state.files, name);
    // An in-flight print re-enables the control itself when it completes
    view.setPrintEnabled(!state.printInFlight);
    view.showMessage('action', '', false);
    updatePreview();
  }

  async function print(): Promise<void> {
    const filename = state.selectedFile;
    if (filename === null || state.printInFlight) return;

    const known = (state.status?.printers ?? []).map((p) => p.name);
    const result = validatePrintForm(filename, view.readPrintForm(), known);
    if (!result.ok) {
      view.showMessage('action', result.error, true);
      return;
    }

    state.printInFlight = true;
    view.setPrintEnabled(false);
    view.showMessage('action', 'Sending job to CUPS…', false);
    let outcome: string;
    let failed = false;
    try {
      const res = await api.print(result.body);
      outcome = res.lp_stdout ? `Queued: ${res.lp_stdout}` : 'Queued.';
    } catch (error) {
      outcome = `Print failed: ${messageOf(error)}`;
      failed = true;
    } finally {
      state.printInFlight = false;
      view.setPrintEnabled(state.selectedFile !== null);
    }
    view.showMessage('action', outcome, failed);

    try {
      await refreshStatus();
    } catch (error) {
      // The footer tracks the live channel only
      view.showMessage('action', `${outcome} Status refresh failed: ${messageOf(error)}`, true);
    }
  }

  async function refresh(): Promise<void> {
    try {
      await refreshAll();
      view.showMessage('action', 'Refreshed.', false);
    } catch (error) {
      view.showMessage('action', `Refresh failed: ${messageOf(error)}`, true);
    }
  }

  async function saveConfig(): Promise<void> {
    if (!state.config) {
      view.showMessage('settings', 'Config not loaded.', true);
      return;
    }

    const draft = overlaySettings(state.config, view.readSettingsForm());
    view.showMessage('settings', 'Saving…', false);
    let saved: AppConfig;
    try {
      saved = (await api.saveConfig(draft)).config;
    } catch (error) {
      // The form keeps the edits; state.config is still the last good copy
      view.showMessage('settings', `Save failed: ${messageOf(error)}`, true);
      return;
    }

    applyConfig(saved);
    view.showMessage('settings', 'Saved.', false);
    try {
      await refreshStatus();
    } catch (error) {
      view.showMessage('settings', `Saved, but status refresh failed: ${messageOf(error)}`, true);
    }
  }

  async function restart(): Promise<void> {
    if (!view.confirm('Restart the host now? This will interrupt prints.')) return;
    view.showMessage('action', 'Restart requested…', false);
    try {
      const res = await api.restartHost();
      view.showMessage('action', res.output || 'Host restart command sent.', false);
    } catch (error) {
      view.showMessage('action', `Restart failed: ${messageOf(error)}`, true);
    }
  }

  async function ensureAirprint(): Promise<void> {
    view.showMessage('action', 'Refreshing AirPrint advertising…', false);
    try {
      const res = await api.ensureAirprint();
      view.showMessage('action', res.output || 'AirPrint refresh completed.', false);
    } catch (error) {
      view.showMessage('action', `AirPrint refresh failed: ${messageOf(error)}`, true);
    }
  }

  async function deleteFile(name: string): Promise<void> {
    if (!view.confirm(`Delete ${name}?`)) return;
    try {
      await api.deleteFile(name);
      await refreshFiles();
      view.showMessage('action', `Deleted ${name}.`, false);
    } catch (error) {
      view.showMessage('action', `Delete failed: ${messageOf(error)}`, true);
    }
  }

  function setPreferences(next: SessionState['preferences']): void {
    state.preferences = next;
    savePreferences(deps.preferences, next);
    view.applyPreferences(next);
  }

  async function dispatch(command: SessionCommand): Promise<void> {
    switch (command.type) {
      case 'select-file':
        return selectFile(command.name);
      case 'print':
        return print();
      case 'refresh':
        return refresh();
      case 'save-config':
        return saveConfig();
      case 'restart':
        return restart();
      case 'ensure-airprint':
        return ensureAirprint();
      case 'delete-file':
        return deleteFile(command.name);
      case 'preview-changed':
        return updatePreview();
      case 'resize':
        return resizePreview();
      // A load that finishes after deselection belongs to no file
      case 'preview-loaded':
        if (state.selectedFile === null) return;
        return view.setPreviewVisible(true);
      case 'preview-failed':
        if (state.selectedFile === null) return;
        view.setPreviewVisible(false);
        return view.showMessage('action', 'Preview failed. (Is the file type supported?)', true);
      case 'toggle-dark':
        return setPreferences(toggleDark(state.preferences));
      case 'toggle-eink':
        return setPreferences(toggleEink(state.preferences));
    }
  }

  return {
    state,

    async start() {
      view.applyPreferences(state.preferences);
      view.setPrintEnabled(false);
      view.setPreviewVisible(false);
      setFooter('Connecting…');

      try {
        await refreshAll();
      } catch (error) {
        setFooter('Disconnected');
        view.showMessage('action', `Startup failed: ${messageOf(error)}`, true);
        return;
      }

      if (state.config) {
        // Later config pulls leave the print controls alone
        view.seedPrintForm(state.config.printing);
        // Server-side UI defaults apply until the user picks a mode here
        if (!hasStoredPreferences(deps.preferences)) {
          state.preferences = loadPreferences(deps.preferences, state.config.ui);
          view.applyPreferences(state.preferences);
        }
      }
      openLiveChannel();
    },

    dispatch,

    stop() {
      resizePreview.cancel();
      subscription?.unsubscribe();
      subscription = null;
    },
  };
}

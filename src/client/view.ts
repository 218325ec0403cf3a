import type { AppConfig, PrintingConfig } from '../models/config.model';
import type { StatusSnapshot, UploadedFile } from '../models/status.model';
import type { DisplayPreferences } from './preferences';
import type { PrintFormValues } from './validation';

export type MessagePanel = 'action' | 'settings';

/** Raw settings form contents; numbers stay strings until the server validates them */
export interface SettingsFormValues {
  readonly default_printer: string;
  readonly preview_dpi: string;
  readonly print_dpi: string;
  readonly bw_threshold: string;
  readonly max_pdf_pages_process: string;
  readonly auto_enable: boolean;
}

/** What the session controller needs from a UI; implemented by the DOM view and by test fakes */
export interface SessionView {
  renderFiles(files: readonly UploadedFile[], selected: string | null): void;
  /** `preferredPrinter` is the configured default, used until the user picks one */
  renderStatus(status: StatusSnapshot, preferredPrinter: string): void;
  /** Fill the settings panel; the print controls are left as the user set them */
  populateSettings(config: AppConfig): void;
  /** Initial mode and copies for the print controls */
  seedPrintForm(printing: PrintingConfig): void;
  readPrintForm(): PrintFormValues;
  readSettingsForm(): SettingsFormValues;
  setPrintEnabled(enabled: boolean): void;
  showMessage(panel: MessagePanel, text: string, isError: boolean): void;
  setFooterStatus(text: string): void;
  /** Start loading a preview image; the view reports back with preview-loaded / preview-failed */
  loadPreview(url: string): void;
  setPreviewVisible(visible: boolean): void;
  /** Hide the preview and abandon any image still loading */
  clearPreview(): void;
  previewContainerWidth(): number | undefined;
  confirm(question: string): boolean;
  applyPreferences(preferences: DisplayPreferences): void;
}

import type { AppConfig } from '../models/config.model';
import type { StatusSnapshot, UploadedFile } from '../models/status.model';
import type { DisplayPreferences } from './preferences';

export type FooterStatus = 'Connecting…' | 'Live' | 'Reconnecting…' | 'Disconnected' | 'No live updates';

/** Everything the controller knows; the server-owned parts are only ever replaced whole */
export interface SessionState {
  selectedFile: string | null;
  files: readonly UploadedFile[];
  status: StatusSnapshot | null;
  config: AppConfig | null;
  printInFlight: boolean;
  preferences: DisplayPreferences;
  footer: FooterStatus;
}

export function createSessionState(preferences: DisplayPreferences): SessionState {
  return {
    selectedFile: null,
    files: [],
    status: null,
    config: null,
    printInFlight: false,
    preferences,
    footer: 'Connecting…',
  };
}

/** The selection survives only while the file list still contains it */
export function reconcileSelection(selected: string | null, files: readonly UploadedFile[]): string | null {
  if (selected === null) return null;
  return files.some((f) => f.name === selected) ? selected : null;
}

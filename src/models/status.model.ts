export type PrinterState = 'idle' | 'busy' | 'disabled';

export interface UploadedFile {
  readonly name: string;
  readonly size: number;
  readonly size_h: string;
  /** Unix seconds */
  readonly mtime: number;
}

export interface PrinterInfo {
  readonly name: string;
  readonly state: PrinterState;
  /** null when `lpstat -a` did not report the printer */
  readonly accepting: boolean | null;
  readonly is_default: boolean;
  readonly display_name: string | null;
}

export interface QueueJob {
  readonly job_id: number;
  readonly request_id: string;
  readonly user: string;
  readonly size: string;
  readonly raw: string;
}

export interface JobStats {
  readonly active_jobs: number;
  readonly completed_jobs: number;
  readonly last_completed_raw: string;
}

export interface StatusSnapshot {
  readonly cups_available: boolean;
  readonly default_printer: string;
  readonly default_printer_display: string;
  readonly default_printer_label: string;
  readonly printers: readonly PrinterInfo[];
  readonly jobs: readonly QueueJob[];
  readonly stats: JobStats;
  readonly airprint: { readonly enabled: boolean };
}

/** Payload of a `status` event on the live channel */
export interface StatusUpdate {
  readonly ts: number;
  readonly files: readonly UploadedFile[];
  readonly status: StatusSnapshot;
}

import type { PrinterInfo, QueueJob, StatusUpdate } from '../../models/status.model';
import type { PrinterGateway } from '../cups.service';

export const OFFICE_LASER: PrinterInfo = {
  name: 'Office_Laser',
  state: 'idle',
  accepting: true,
  is_default: true,
  display_name: 'Second floor laser',
};

export const QUEUED_JOB: QueueJob = {
  job_id: 12,
  request_id: 'Office_Laser-12',
  user: 'alice',
  size: '1024',
  raw: 'Office_Laser-12  alice  1024  Mon 05 Jan 2026 09:30:00 AM',
};

/** A healthy one-printer CUPS; override single methods per test */
export function fakeGateway(overrides: Partial<PrinterGateway> = {}): PrinterGateway {
  return {
    isAvailable: async () => true,
    getDefaultPrinter: async () => 'Office_Laser',
    getPrinterLabels: async () => new Map([['Office_Laser', 'Second floor laser']]),
    listPrinters: async () => [OFFICE_LASER],
    listQueue: async () => [QUEUED_JOB],
    listCompleted: async () => ['Office_Laser-10 alice 1024', 'Office_Laser-11 bob 2048'],
    printerDetail: async (name) => ({ name, detail: `printer ${name} is idle.` }),
    printFile: async (filePath) => ({
      argv: ['lp', filePath],
      exitCode: 0,
      stdout: 'request id is Office_Laser-13 (1 file(s))\n',
      stderr: '',
      durationMs: 5,
    }),
    cancelJob: async () => undefined,
    ...overrides,
  };
}

export function statusUpdate(ts = 1767600000): StatusUpdate {
  return {
    ts,
    files: [{ name: 'invoice.pdf', size: 2048, size_h: '2.0 KB', mtime: 1767590000 }],
    status: {
      cups_available: true,
      default_printer: 'Office_Laser',
      default_printer_display: 'Second floor laser',
      default_printer_label: 'Second floor laser (default)',
      printers: [OFFICE_LASER],
      jobs: [QUEUED_JOB],
      stats: { active_jobs: 1, completed_jobs: 2, last_completed_raw: 'Office_Laser-11 bob 2048' },
      airprint: { enabled: true },
    },
  };
}

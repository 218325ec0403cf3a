import type { AppConfig } from '../models/config.model';
import type { JobStats, StatusSnapshot } from '../models/status.model';
import { logger } from '../utils/logger';
import type { AirPrintAutoEnsurer } from './airprint.service';
import type { PrinterGateway } from './cups.service';

export interface StatusAggregatorDeps {
  readonly gateway: PrinterGateway;
  readonly getConfig: () => AppConfig;
  readonly airprint?: AirPrintAutoEnsurer;
}

export interface StatusAggregator {
  getSnapshot(): Promise<StatusSnapshot>;
}

/**
 * Collects printers, queue and job counters into one snapshot. When CUPS is
 * missing or any lpstat call fails, the snapshot degrades to "unavailable"
 * and the job counters keep their last known values.
 */
export function createStatusAggregator(deps: StatusAggregatorDeps): StatusAggregator {
  let lastStats: JobStats = { active_jobs: 0, completed_jobs: 0, last_completed_raw: '' };

  function unavailable(airprintEnabled: boolean): StatusSnapshot {
    return {
      cups_available: false,
      default_printer: '',
      default_printer_display: '',
      default_printer_label: '',
      printers: [],
      jobs: [],
      stats: lastStats,
      airprint: { enabled: airprintEnabled },
    };
  }

  function triggerAirprint(printerNames: readonly string[]): void {
    if (!deps.airprint) return;
    deps.airprint.maybeEnsure(printerNames).catch((error: unknown) => {
      logger.warn({ error }, 'AirPrint auto ensure rejected');
    });
  }

  async function collect(airprintEnabled: boolean): Promise<StatusSnapshot> {
    const { gateway } = deps;
    if (!(await gateway.isAvailable())) {
      return unavailable(airprintEnabled);
    }

    const [defaultPrinter, labels] = await Promise.all([gateway.getDefaultPrinter(), gateway.getPrinterLabels()]);
    const [printers, jobs, completed] = await Promise.all([
      gateway.listPrinters(defaultPrinter, labels),
      gateway.listQueue(),
      gateway.listCompleted(),
    ]);

    lastStats = {
      active_jobs: jobs.length,
      completed_jobs: completed.length,
      last_completed_raw: completed[completed.length - 1] ?? '',
    };

    if (airprintEnabled) {
      triggerAirprint(printers.map((p) => p.name));
    }

    const display = defaultPrinter ? labels.get(defaultPrinter) ?? defaultPrinter : '';
    return {
      cups_available: true,
      default_printer: defaultPrinter,
      default_printer_display: display,
      default_printer_label: display ? `${display} (default)` : '',
      printers,
      jobs,
      stats: lastStats,
      airprint: { enabled: airprintEnabled },
    };
  }

  return {
    async getSnapshot() {
      const airprintEnabled = deps.getConfig().airprint.auto_enable;
      try {
        return await collect(airprintEnabled);
      } catch (error) {
        logger.warn({ error }, 'Printer status unavailable');
        return unavailable(airprintEnabled);
      }
    },
  };
}

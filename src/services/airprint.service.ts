import fs from 'fs';
import { config } from '../config';
import { type CommandRunner, runCommand } from '../utils/command';
import { PrinterPalError } from '../utils/errors';
import { logger } from '../utils/logger';

/** Privileged operations, delegated to the root helper through `sudo -n` */
export interface RootHelper {
  ensureAirprint(timeoutMs?: number): Promise<string>;
  restartHost(): Promise<string>;
}

export function createRootHelper(
  helperPath: string = config.rootHelper,
  run: CommandRunner = runCommand,
  exists: (p: string) => boolean = fs.existsSync
): RootHelper {
  async function invoke(action: string, timeoutMs: number): Promise<string> {
    if (!exists(helperPath)) {
      throw new PrinterPalError(`Root helper not found at ${helperPath}`);
    }
    const res = await run(['sudo', '-n', helperPath, action], { timeoutMs, check: true });
    logger.info({ action, durationMs: res.durationMs }, 'Root helper finished');
    return res.stdout.trim();
  }

  return {
    ensureAirprint: (timeoutMs = 45_000) => invoke('ensure-airprint', timeoutMs),
    restartHost: () => invoke('restart-host', 5_000),
  };
}

export interface AirPrintAutoEnsurer {
  /** Re-advertise when the printer set changed or the interval elapsed; resolves true if it ran */
  maybeEnsure(printerNames: readonly string[]): Promise<boolean>;
}

const AUTO_ENSURE_INTERVAL_MS = 10 * 60 * 1000;

export function createAirPrintAutoEnsurer(
  helper: RootHelper,
  options: { intervalMs?: number; now?: () => number } = {}
): AirPrintAutoEnsurer {
  const intervalMs = options.intervalMs ?? AUTO_ENSURE_INTERVAL_MS;
  const now = options.now ?? Date.now;
  let lastRun: number | null = null;
  let lastSignature = '';
  let running = false;

  return {
    async maybeEnsure(printerNames) {
      const signature = [...printerNames].filter(Boolean).sort().join(',');
      const due = lastRun === null || signature !== lastSignature || now() - lastRun > intervalMs;
      if (!due || running) return false;

      // A failed attempt also waits out the interval before retrying
      running = true;
      lastSignature = signature;
      try {
        await helper.ensureAirprint();
        return true;
      } catch (error) {
        logger.warn({ error }, 'Automatic AirPrint ensure failed');
        return false;
      } finally {
        lastRun = now();
        running = false;
      }
    },
  };
}

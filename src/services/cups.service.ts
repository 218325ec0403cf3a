import fs from 'fs/promises';
import { config } from '../config';
import type { PrinterInfo, PrinterState, QueueJob } from '../models/status.model';
import { type CommandResult, type CommandRunner, runCommand } from '../utils/command';
import { CommandError, PrinterPalError } from '../utils/errors';
import { logger } from '../utils/logger';

// Pi + CUPS can be sluggish
const LPSTAT_TIMEOUT_MS = 6000;

const LPSTAT_PRINTER_RE = /^printer\s+(\S+)\s+(?:is\s+)?(idle|disabled|busy|now printing)\b/i;
const PRINTERS_CONF_START_RE = /^<(?:Default)?Printer\s+([^>]+)>/;
const PRINTERS_CONF_INFO_RE = /^Info\s+(.+)$/;
const JOB_ID_RE = /^[A-Za-z0-9_.-]+$/;

export interface PrintFileOptions {
  readonly printer: string | null;
  readonly copies: number;
  readonly title: string;
  readonly options?: readonly string[];
  readonly timeoutMs?: number;
}

/** Everything the rest of the server needs from the CUPS command-line tools */
export interface PrinterGateway {
  isAvailable(): Promise<boolean>;
  getDefaultPrinter(): Promise<string>;
  /** printer name -> `Info` label from printers.conf */
  getPrinterLabels(): Promise<Map<string, string>>;
  listPrinters(defaultPrinter: string, labels: Map<string, string>): Promise<PrinterInfo[]>;
  listQueue(): Promise<QueueJob[]>;
  listCompleted(): Promise<string[]>;
  printerDetail(name: string): Promise<{ name: string; detail: string }>;
  printFile(filePath: string, options: PrintFileOptions): Promise<CommandResult>;
  cancelJob(jobId: string): Promise<void>;
}

function toPrinterState(value: string): PrinterState | null {
  const state = value.toLowerCase();
  if (state === 'now printing') return 'busy';
  return state === 'idle' || state === 'busy' || state === 'disabled' ? state : null;
}

/** "system default destination: HP_LaserJet" -> "HP_LaserJet" */
export function parseDefaultPrinter(stdout: string): string {
  const match = /destination:\s*(\S+)/.exec(stdout);
  return match?.[1] ?? '';
}

/** Parse `lpstat -p`; accepting stays null until `lpstat -a` is applied */
export function parsePrinters(
  stdout: string,
  defaultPrinter: string,
  labels: Map<string, string>
): PrinterInfo[] {
  const printers: PrinterInfo[] = [];
  for (const raw of stdout.split('\n')) {
    const match = LPSTAT_PRINTER_RE.exec(raw.trim());
    if (!match) continue;
    const name = match[1] ?? '';
    const state = toPrinterState(match[2] ?? '');
    if (!state) continue;
    printers.push({
      name,
      state,
      accepting: null,
      is_default: name === defaultPrinter,
      display_name: labels.get(name) ?? null,
    });
  }
  return printers;
}

/** Fill `accepting` from `lpstat -a` ("HP accepting requests since ...") */
export function applyAccepting(printers: readonly PrinterInfo[], stdout: string): PrinterInfo[] {
  const accepting = new Map<string, boolean>();
  for (const raw of stdout.split('\n')) {
    const parts = raw.trim().split(/\s+/);
    const name = parts[0];
    if (!name || accepting.has(name)) continue;
    accepting.set(name, !(parts.includes('not') && parts.includes('accepting')));
  }
  return printers.map((p) => {
    const value = accepting.get(p.name);
    return value === undefined ? p : { ...p, accepting: value };
  });
}

/** Parse `lpstat -o`: "HP_LaserJet-12  alice  1024  Mon 01 Jan 2026 10:00:00 AM" */
export function parseQueue(stdout: string): QueueJob[] {
  const jobs: QueueJob[] = [];
  for (const raw of stdout.split('\n')) {
    const line = raw.trim();
    if (!line) continue;
    const parts = line.split(/\s+/);
    if (parts.length < 3) continue;
    const requestId = parts[0] ?? '';
    const numeric = /-(\d+)$/.exec(requestId);
    jobs.push({
      job_id: numeric ? parseInt(numeric[1] ?? '0', 10) : 0,
      request_id: requestId,
      user: parts[1] ?? '',
      size: parts[2] ?? '',
      raw: line,
    });
  }
  return jobs;
}

/** Extract `<Printer name>` -> `Info ...` pairs from a CUPS printers.conf */
export function parsePrintersConf(text: string): Map<string, string> {
  const labels = new Map<string, string>();
  let current: string | null = null;
  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (!line) continue;
    const start = PRINTERS_CONF_START_RE.exec(line);
    if (start) {
      current = (start[1] ?? '').trim();
      continue;
    }
    if (line.startsWith('</')) {
      current = null;
      continue;
    }
    if (current) {
      const info = PRINTERS_CONF_INFO_RE.exec(line);
      const label = info?.[1]?.trim().replace(/^"|"$/g, '');
      if (label) labels.set(current, label);
    }
  }
  return labels;
}

/** Arguments for `lp`; options are passed one per `-o` so nothing reaches a shell */
export function buildLpArgs(filePath: string, options: PrintFileOptions): string[] {
  const argv = ['lp', '-n', String(options.copies), '-t', options.title];
  if (options.printer) {
    argv.push('-d', options.printer);
  }
  // Force monochrome where the driver supports it; ignored otherwise
  argv.push('-o', 'print-color-mode=monochrome', '-o', 'ColorModel=Gray');
  for (const opt of options.options ?? []) {
    if (opt) argv.push('-o', opt);
  }
  argv.push(filePath);
  return argv;
}

export function createCupsGateway(
  run: CommandRunner = runCommand,
  printersConfPaths: readonly string[] = config.cupsPrintersConf
): PrinterGateway {
  const lpstat = (args: string[]) => run(['lpstat', ...args], { timeoutMs: LPSTAT_TIMEOUT_MS, check: false });

  return {
    async isAvailable() {
      try {
        await lpstat(['-r']);
        return true;
      } catch (error) {
        if (error instanceof PrinterPalError) return false;
        throw error;
      }
    },

    async getDefaultPrinter() {
      const res = await lpstat(['-d']);
      return parseDefaultPrinter(res.stdout);
    },

    async getPrinterLabels() {
      for (const confPath of printersConfPaths) {
        try {
          const labels = parsePrintersConf(await fs.readFile(confPath, 'utf-8'));
          if (labels.size > 0) return labels;
        } catch (error) {
          // printers.conf is usually root-only; labels are optional
          logger.debug({ error, confPath }, 'printers.conf not readable');
        }
      }
      return new Map<string, string>();
    },

    async listPrinters(defaultPrinter, labels) {
      const printers = parsePrinters((await lpstat(['-p'])).stdout, defaultPrinter, labels);
      const accepting = await lpstat(['-a']);
      return applyAccepting(printers, accepting.stdout);
    },

    async listQueue() {
      return parseQueue((await lpstat(['-o'])).stdout);
    },

    async listCompleted() {
      const res = await lpstat(['-W', 'completed', '-o']);
      return res.stdout.split('\n').filter((line) => line.trim().length > 0);
    },

    async printerDetail(name) {
      const res = await lpstat(['-l', '-p', name]);
      return { name, detail: res.stdout.trim() };
    },

    async printFile(filePath, options) {
      if (options.copies < 1 || options.copies > 99) {
        throw new PrinterPalError('copies must be between 1 and 99', 400);
      }
      const argv = buildLpArgs(filePath, options);
      try {
        const result = await run(argv, { timeoutMs: options.timeoutMs ?? 60_000, check: true });
        logger.info({ printer: options.printer ?? '(system default)', copies: options.copies, title: options.title }, 'Job submitted to CUPS');
        return result;
      } catch (error) {
        if (error instanceof CommandError) {
          const detail = error.result.stderr.trim() || error.result.stdout.trim() || 'unknown error';
          throw new PrinterPalError(`Printing failed: ${detail}`);
        }
        throw error;
      }
    },

    async cancelJob(jobId) {
      if (!JOB_ID_RE.test(jobId)) {
        throw new PrinterPalError('Invalid job id', 400);
      }
      await run(['cancel', jobId], { timeoutMs: LPSTAT_TIMEOUT_MS, check: true });
      logger.info({ jobId }, 'Job cancelled');
    },
  };
}

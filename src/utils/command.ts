import { execFile } from 'child_process';
import { CommandError, PrinterPalError } from './errors';

export interface CommandResult {
  readonly argv: readonly string[];
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
}

export interface RunOptions {
  readonly timeoutMs?: number;
  /** Reject with CommandError on a non-zero exit (default true) */
  readonly check?: boolean;
  readonly env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (argv: readonly string[], options?: RunOptions) => Promise<CommandResult>;

/**
 * Run a program without a shell. Missing binaries and timeouts reject with
 * PrinterPalError; exit codes are only an error when `check` is set.
 */
export const runCommand: CommandRunner = (argv, options = {}) => {
  const [file, ...args] = argv;
  const timeoutMs = options.timeoutMs ?? 8000;
  const check = options.check ?? true;

  return new Promise((resolve, reject) => {
    if (!file) {
      reject(new PrinterPalError('argv must not be empty'));
      return;
    }

    const started = Date.now();
    execFile(
      file,
      args,
      {
        timeout: timeoutMs,
        env: { ...process.env, ...options.env },
        maxBuffer: 16 * 1024 * 1024,
        encoding: 'utf8',
      },
      (error, stdout, stderr) => {
        const durationMs = Date.now() - started;
        const code: unknown = error?.code;

        if (code === 'ENOENT') {
          reject(new PrinterPalError(`Command not found: ${file}`));
          return;
        }
        if (error?.killed) {
          reject(new PrinterPalError(`Command timed out after ${(timeoutMs / 1000).toFixed(1)}s: ${argv.join(' ')}`));
          return;
        }
        if (error && typeof code !== 'number') {
          reject(new PrinterPalError(`Command failed to start: ${error.message}`));
          return;
        }

        const result: CommandResult = {
          argv,
          exitCode: typeof code === 'number' ? code : 0,
          stdout: stdout || '',
          stderr: stderr || '',
          durationMs,
        };

        if (check && result.exitCode !== 0) {
          reject(new CommandError(`Command failed (${result.exitCode}): ${argv.join(' ')}`, result));
          return;
        }
        resolve(result);
      }
    );
  });
};

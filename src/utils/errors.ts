import type { CommandResult } from './command';

/** Base error; `statusCode` is the HTTP status a route answers with */
export class PrinterPalError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = 'PrinterPalError';
    this.statusCode = statusCode;
  }
}

/** A command ran but exited non-zero */
export class CommandError extends PrinterPalError {
  readonly result: CommandResult;

  constructor(message: string, result: CommandResult) {
    super(message);
    this.name = 'CommandError';
    this.result = result;
  }
}

export function statusCodeOf(error: unknown, fallback = 500): number {
  return error instanceof PrinterPalError ? error.statusCode : fallback;
}

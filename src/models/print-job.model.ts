export const PRINT_MODES = ['raw', 'grayscale', 'bw', 'dither', 'outline'] as const;

export type PrintMode = (typeof PRINT_MODES)[number];

/** Body of POST /api/print */
export interface PrintRequestBody {
  readonly filename: string;
  readonly mode: string;
  readonly printer: string;
  readonly copies: number;
}

export interface PrintResponse {
  readonly ok: true;
  readonly lp_stdout: string;
}

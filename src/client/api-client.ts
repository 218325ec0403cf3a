import type { AppConfig } from '../models/config.model';
import type { PrintRequestBody } from '../models/print-job.model';
import type { StatusSnapshot, UploadedFile } from '../models/status.model';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Non-2xx response; the message carries the server's `error`/`message` or the raw body */
export class ApiError extends Error {
  readonly status: number;
  readonly detail: string;

  constructor(status: number, statusText: string, detail: string) {
    super(`${status} ${statusText}: ${detail}`);
    this.name = 'ApiError';
    this.status = status;
    this.detail = detail;
  }
}

/** Pick `error` or `message` out of a JSON error body, else the raw text */
export function errorDetail(text: string): string {
  try {
    const data: unknown = text ? JSON.parse(text) : null;
    if (data && typeof data === 'object') {
      if ('error' in data && typeof data.error === 'string' && data.error) return data.error;
      if ('message' in data && typeof data.message === 'string' && data.message) return data.message;
    }
  } catch {
    // not JSON; the raw body is the detail
  }
  return text;
}

export interface ApiClient {
  getFiles(): Promise<{ files: UploadedFile[] }>;
  getStatus(): Promise<StatusSnapshot>;
  getConfig(): Promise<{ config: AppConfig }>;
  saveConfig(config: AppConfig): Promise<{ config: AppConfig }>;
  print(body: PrintRequestBody): Promise<{ lp_stdout?: string }>;
  deleteFile(name: string): Promise<void>;
  restartHost(): Promise<{ output?: string }>;
  ensureAirprint(): Promise<{ output?: string }>;
}

export interface ApiClientOptions {
  readonly fetch?: FetchLike;
  readonly baseUrl?: string;
  /** Sent as X-PrinterPal-Token when the server requires one */
  readonly token?: string;
}

export function createApiClient(options: ApiClientOptions = {}): ApiClient {
  const doFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const base = (options.baseUrl ?? '').replace(/\/$/, '');
  const authHeaders: Record<string, string> = options.token ? { 'X-PrinterPal-Token': options.token } : {};

  async function request<T>(method: string, url: string, body?: unknown): Promise<T> {
    const res = await doFetch(`${base}${url}`, {
      method,
      cache: 'no-store',
      headers: method === 'GET' ? authHeaders : { ...authHeaders, 'Content-Type': 'application/json' },
      body: method === 'GET' ? undefined : JSON.stringify(body ?? {}),
    });
    const text = await res.text();
    if (!res.ok) {
      throw new ApiError(res.status, res.statusText, errorDetail(text));
    }
    const data: T = text ? JSON.parse(text) : {};
    return data;
  }

  return {
    getFiles: () => request('GET', '/api/files'),
    getStatus: () => request('GET', '/api/status'),
    getConfig: () => request('GET', '/api/config'),
    saveConfig: (config) => request('POST', '/api/config', { config }),
    print: (body) => request('POST', '/api/print', body),
    deleteFile: async (name) => {
      await request<unknown>('DELETE', `/api/files/${encodeURIComponent(name)}`);
    },
    restartHost: () => request('POST', '/api/restart-host', {}),
    ensureAirprint: () => request('POST', '/api/airprint/ensure', {}),
  };
}

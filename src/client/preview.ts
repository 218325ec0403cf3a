export interface PreviewRequest {
  readonly filename: string;
  readonly mode: string;
  readonly page: number;
  readonly width: number;
}

const MIN_WIDTH = 320;
const MAX_WIDTH = 1400;
const GUTTER = 24;

/** Preview width for a container, clamped to 320..1400 */
export function computePreviewWidth(containerWidth: number | undefined): number {
  const available = Math.floor((containerWidth ?? 720) - GUTTER);
  return Math.min(MAX_WIDTH, Math.max(MIN_WIDTH, available));
}

export function buildPreviewUrl(request: PreviewRequest, token: string): string {
  const query = new URLSearchParams({
    mode: request.mode,
    page: String(request.page),
    w: String(request.width),
    _: token,
  });
  return `/api/preview/${encodeURIComponent(request.filename)}?${query.toString()}`;
}

/** Tokens are unique per call, even within the same millisecond */
export function createCacheBuster(now: () => number = Date.now): () => string {
  let counter = 0;
  return () => `${now()}-${counter++}`;
}

export interface Debounced<A extends unknown[]> {
  (...args: A): void;
  cancel(): void;
}

/** Trailing-edge debounce: only the last call in a burst runs, `waitMs` after it */
export function debounce<A extends unknown[]>(fn: (...args: A) => void, waitMs: number): Debounced<A> {
  let timer: ReturnType<typeof setTimeout> | null = null;

  const debounced = (...args: A) => {
    if (timer) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = null;
      fn(...args);
    }, waitMs);
  };

  return Object.assign(debounced, {
    cancel() {
      if (timer) clearTimeout(timer);
      timer = null;
    },
  });
}

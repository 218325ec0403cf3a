import type { StatusUpdate } from '../models/status.model';

/** The parts of EventSource the live channel uses */
export interface LiveSource {
  onEvent(event: string, listener: (data: string) => void): void;
  onError(listener: () => void): void;
  close(): void;
}

export type LiveSourceFactory = (url: string) => LiveSource;

export type ChannelState = 'connecting' | 'live' | 'reconnecting' | 'closed';

export interface LiveChannelHandlers {
  onUpdate(update: StatusUpdate): void;
  onStateChange(state: ChannelState): void;
  /** A `status` event that could not be decoded */
  onInvalid?(error: Error): void;
}

export interface LiveChannelOptions {
  readonly url?: string;
  readonly createSource?: LiveSourceFactory;
  readonly initialDelayMs?: number;
  readonly maxDelayMs?: number;
}

export interface Subscription {
  unsubscribe(): void;
}

export const browserEventSource: LiveSourceFactory = (url) => {
  const source = new EventSource(url);
  return {
    onEvent: (event, listener) => source.addEventListener(event, (ev) => listener(String(ev.data))),
    onError: (listener) => source.addEventListener('error', () => listener()),
    close: () => source.close(),
  };
};

export function isStatusUpdate(value: unknown): value is StatusUpdate {
  if (!value || typeof value !== 'object') return false;
  if (!('files' in value) || !Array.isArray(value.files)) return false;
  return 'status' in value && typeof value.status === 'object' && value.status !== null;
}

/** Delay before reconnect attempt `attempt` (1-based): doubles up to the cap */
export function backoffDelay(attempt: number, initialDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, initialDelayMs * 2 ** Math.max(0, attempt - 1));
}

/**
 * Subscribe to `status` pushes. On any transport error the source is closed
 * and reopened with exponential backoff; the next event carries full state,
 * so nothing missed in between needs replaying.
 */
export function subscribeToStatus(handlers: LiveChannelHandlers, options: LiveChannelOptions = {}): Subscription {
  const url = options.url ?? '/events';
  const createSource = options.createSource ?? browserEventSource;
  const initialDelayMs = options.initialDelayMs ?? 1000;
  const maxDelayMs = options.maxDelayMs ?? 30_000;

  let source: LiveSource | null = null;
  let retryTimer: ReturnType<typeof setTimeout> | null = null;
  let attempts = 0;
  let closed = false;

  function handleStatus(data: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      handlers.onInvalid?.(error instanceof Error ? error : new Error(String(error)));
      return;
    }
    if (!isStatusUpdate(parsed)) {
      handlers.onInvalid?.(new Error('status event without files/status'));
      return;
    }
    attempts = 0;
    handlers.onStateChange('live');
    handlers.onUpdate(parsed);
  }

  function scheduleReconnect(): void {
    if (closed || retryTimer) return;
    attempts++;
    handlers.onStateChange('reconnecting');
    retryTimer = setTimeout(() => {
      retryTimer = null;
      try {
        open();
      } catch {
        scheduleReconnect();
      }
    }, backoffDelay(attempts, initialDelayMs, maxDelayMs));
  }

  function open(): void {
    if (closed) return;
    const current = createSource(url);
    source = current;
    current.onEvent('status', handleStatus);
    current.onError(() => {
      // Ignore late errors from a source already replaced
      if (source !== current) return;
      current.close();
      source = null;
      scheduleReconnect();
    });
  }

  handlers.onStateChange('connecting');
  open();

  return {
    unsubscribe() {
      closed = true;
      if (retryTimer) clearTimeout(retryTimer);
      retryTimer = null;
      source?.close();
      source = null;
      handlers.onStateChange('closed');
    },
  };
}

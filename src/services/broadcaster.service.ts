import type { StatusUpdate } from '../models/status.model';
import { logger } from '../utils/logger';

/** One connected client; `send` throws when the client is gone */
export interface LiveChannel {
  readonly id: string;
  send(event: string, data: unknown): void;
}

export interface BroadcasterOptions {
  readonly buildPayload: () => Promise<StatusUpdate>;
  readonly intervalMs: number;
}

export interface Broadcaster {
  /** Register a channel and push current state to it; returns the unsubscribe function */
  subscribe(channel: LiveChannel): () => void;
  /** Build one payload and deliver it to every channel */
  publish(): Promise<void>;
  size(): number;
  stop(): void;
}

/**
 * Level-triggered fan-out: each tick carries the full state, so nothing is
 * buffered for clients that miss a tick. The timer only runs while at least
 * one channel is subscribed.
 */
export function createBroadcaster(options: BroadcasterOptions): Broadcaster {
  const channels = new Map<string, LiveChannel>();
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<void> | null = null;

  function deliver(channel: LiveChannel, event: string, data: unknown): void {
    try {
      channel.send(event, data);
    } catch (error) {
      channels.delete(channel.id);
      logger.info({ channel: channel.id, error: error instanceof Error ? error.message : String(error) }, 'Live channel dropped');
    }
  }

  async function buildAndSend(targets: readonly LiveChannel[]): Promise<void> {
    try {
      const payload = await options.buildPayload();
      for (const channel of targets) deliver(channel, 'status', payload);
    } catch (error) {
      logger.error({ error }, 'Failed to build status payload');
      const message = { ts: Math.floor(Date.now() / 1000), error: error instanceof Error ? error.message : String(error) };
      for (const channel of targets) deliver(channel, 'status-error', message);
    }
  }

  function publish(): Promise<void> {
    // A slow lpstat must not stack up ticks
    if (inFlight) return inFlight;
    inFlight = buildAndSend([...channels.values()]).finally(() => {
      inFlight = null;
    });
    return inFlight;
  }

  function tick(): void {
    publish().catch((error: unknown) => logger.error({ error }, 'Broadcast tick failed'));
  }

  function stop(): void {
    if (timer) {
      clearInterval(timer);
      timer = null;
    }
  }

  return {
    subscribe(channel) {
      channels.set(channel.id, channel);
      logger.debug({ channel: channel.id, total: channels.size }, 'Live channel opened');
      if (!timer) {
        timer = setInterval(tick, options.intervalMs);
      }
      buildAndSend([channel]).catch((error: unknown) => logger.error({ error }, 'Initial push failed'));

      return () => {
        channels.delete(channel.id);
        logger.debug({ channel: channel.id, total: channels.size }, 'Live channel closed');
        if (channels.size === 0) stop();
      };
    },
    publish,
    size: () => channels.size,
    stop,
  };
}

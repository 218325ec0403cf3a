import { Router, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { Broadcaster, LiveChannel } from '../services/broadcaster.service';

/** The slice of a response an SSE channel writes to */
export interface SseSink {
  write(chunk: string): boolean;
  destroy(): void;
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
  /** Bytes queued but not yet flushed to the socket */
  readonly writableLength: number;
}

/** A client that has not drained this much is treated as gone */
export const SSE_MAX_BUFFERED_BYTES = 1024 * 1024;

export function createSseChannel(
  sink: SseSink,
  id: string = `sse-${uuidv4()}`,
  maxBufferedBytes: number = SSE_MAX_BUFFERED_BYTES
): LiveChannel {
  return {
    id,
    send(event, data) {
      if (sink.writableEnded || sink.destroyed) {
        throw new Error('SSE client disconnected');
      }
      const flushed = sink.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
      if (!flushed && sink.writableLength > maxBufferedBytes) {
        sink.destroy();
        throw new Error(`SSE client stalled with ${sink.writableLength} bytes buffered`);
      }
    },
  };
}

export function createEventsRouter(broadcaster: Broadcaster): Router {
  const router = Router();

  /** GET /events - Server-Sent Events stream of `status` updates */
  router.get('/', (req: Request, res: Response) => {
    res.set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.flushHeaders();
    res.write('retry: 3000\n\n');

    const unsubscribe = broadcaster.subscribe(createSseChannel(res));
    req.on('close', unsubscribe);
  });

  return router;
}

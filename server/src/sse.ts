import type { SyncEvent } from '../../shared/src/types.js';
import type { EventSubscriber } from './event-hub.js';

export const SSE_KEEPALIVE_FRAME = ': keepalive\n\n';
export const DEFAULT_SSE_KEEPALIVE_MS = 30_000;

/** The slice of `http.ServerResponse` the pump writes through. */
export interface EventStreamSink {
  readonly destroyed: boolean;
  readonly writableEnded: boolean;
  write(frame: string): boolean;
  end(): void;
}

export function formatSseData(event: SyncEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

function writeFrame(response: EventStreamSink, frame: string): boolean {
  if (response.destroyed || response.writableEnded) {
    return false;
  }

  response.write(frame);
  return true;
}

/**
 * Drains a subscriber into an open event-stream response until either side closes,
 * writing a keepalive comment whenever the queue stays idle for `keepaliveMs`.
 */
export async function pumpEventStream(
  subscriber: EventSubscriber,
  response: EventStreamSink,
  greeting: SyncEvent,
  keepaliveMs: number
): Promise<void> {
  try {
    if (!writeFrame(response, formatSseData(greeting))) {
      return;
    }

    while (!subscriber.closed) {
      const event = await subscriber.take(keepaliveMs);

      if (subscriber.closed) {
        break;
      }

      if (!writeFrame(response, event ? formatSseData(event) : SSE_KEEPALIVE_FRAME)) {
        break;
      }
    }
  } finally {
    subscriber.close();

    if (!response.writableEnded) {
      response.end();
    }
  }
}

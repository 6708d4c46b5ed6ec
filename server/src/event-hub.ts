import type { SyncEvent } from '../../shared/src/types.js';

export const DEFAULT_SUBSCRIBER_QUEUE_SIZE = 100;

interface PendingTake {
  resolve: (event: SyncEvent | null) => void;
  timer: NodeJS.Timeout;
}

/**
 * One open event stream. Events are delivered in publish order through a bounded FIFO;
 * `offer` never blocks and reports a full or closed queue so the hub can evict.
 */
export class EventSubscriber {
  private readonly queue: SyncEvent[] = [];
  private pending: PendingTake | null = null;
  private isClosed = false;

  constructor(
    readonly id: number,
    private readonly capacity: number,
    private readonly onClose: (subscriber: EventSubscriber) => void
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get queued(): number {
    return this.queue.length;
  }

  offer(event: SyncEvent): boolean {
    if (this.isClosed) {
      return false;
    }

    if (this.pending) {
      const { resolve, timer } = this.pending;
      this.pending = null;
      clearTimeout(timer);
      resolve(event);
      return true;
    }

    if (this.queue.length >= this.capacity) {
      return false;
    }

    this.queue.push(event);
    return true;
  }

  /** Resolves with the next event, or null once `timeoutMs` passes idle or the subscriber closes. */
  take(timeoutMs: number): Promise<SyncEvent | null> {
    const next = this.queue.shift();

    if (next) {
      return Promise.resolve(next);
    }

    if (this.isClosed) {
      return Promise.resolve(null);
    }

    if (this.pending) {
      return Promise.reject(new Error('Subscriber already has a pending take.'));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve(null);
      }, timeoutMs);
      this.pending = { resolve, timer };
    });
  }

  close(): void {
    if (this.isClosed) {
      return;
    }

    this.isClosed = true;
    this.queue.length = 0;

    if (this.pending) {
      const { resolve, timer } = this.pending;
      this.pending = null;
      clearTimeout(timer);
      resolve(null);
    }

    this.onClose(this);
  }
}

/** Best-effort fan-out with no history: a subscriber only sees events published while it is open. */
export class EventHub {
  private readonly subscribers = new Set<EventSubscriber>();
  private nextId = 1;

  constructor(private readonly queueSize = DEFAULT_SUBSCRIBER_QUEUE_SIZE) {}

  get size(): number {
    return this.subscribers.size;
  }

  subscribe(): EventSubscriber {
    const subscriber = new EventSubscriber(this.nextId, this.queueSize, (closed) => {
      this.subscribers.delete(closed);
    });
    this.nextId += 1;
    this.subscribers.add(subscriber);
    return subscriber;
  }

  /** Returns how many subscribers accepted the event; the rest are evicted. */
  publish(event: SyncEvent): number {
    let delivered = 0;

    for (const subscriber of [...this.subscribers]) {
      if (subscriber.offer(event)) {
        delivered += 1;
      } else {
        subscriber.close();
      }
    }

    return delivered;
  }

  closeAll(): void {
    for (const subscriber of [...this.subscribers]) {
      subscriber.close();
    }
  }
}

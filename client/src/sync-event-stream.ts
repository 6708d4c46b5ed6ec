import { Subject, type Observable } from 'rxjs';
import type { Logger } from '../../shared/src/logger.js';
import { isSyncEvent } from '../../shared/src/guards.js';
import type { CatalogUploadedEvent, ResultsChangedEvent, SyncNotification } from '../../shared/src/types.js';
import { SseParser, parseSyncEvent } from './sse-parser.js';
import { normalizeBaseUrl } from './sync-api-client.js';

export interface SyncEventStreamOptions {
  logger: Logger;
  /** Must exceed the server keepalive interval, or idle streams look dead. */
  readTimeoutMs?: number;
  retryDelayMs?: number;
  fetchImpl?: typeof fetch;
}

const DEFAULT_READ_TIMEOUT_MS = 60_000;
const DEFAULT_RETRY_DELAY_MS = 5_000;
const DEFAULT_STOP_TIMEOUT_MS = 2_000;

/**
 * Long-lived subscription to a server's `/api/events` stream. Runs its own reconnect loop
 * so callers never wait on it; every dropped connection is reported and retried after a
 * fixed delay until `stop()`.
 */
export class SyncEventStream {
  private readonly url: string;
  private readonly logger: Logger;
  private readonly readTimeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private loop: Promise<void> | null = null;
  private shouldStop = false;
  private controller: AbortController | null = null;
  private wakeRetry: (() => void) | null = null;
  private streamOpen = false;

  private readonly eventSubject = new Subject<SyncNotification>();
  private readonly catalogUploadedSubject = new Subject<CatalogUploadedEvent>();
  private readonly resultsChangedSubject = new Subject<ResultsChangedEvent>();
  private readonly connectedSubject = new Subject<void>();
  private readonly disconnectedSubject = new Subject<void>();
  private readonly errorSubject = new Subject<string>();

  readonly events$: Observable<SyncNotification> = this.eventSubject.asObservable();
  readonly catalogUploaded$: Observable<CatalogUploadedEvent> = this.catalogUploadedSubject.asObservable();
  readonly resultsChanged$: Observable<ResultsChangedEvent> = this.resultsChangedSubject.asObservable();
  readonly connected$: Observable<void> = this.connectedSubject.asObservable();
  readonly disconnected$: Observable<void> = this.disconnectedSubject.asObservable();
  readonly errors$: Observable<string> = this.errorSubject.asObservable();

  constructor(serverUrl: string, options: SyncEventStreamOptions) {
    this.url = `${normalizeBaseUrl(serverUrl)}/api/events`;
    this.logger = options.logger.child({ component: 'sse_client' });
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  isConnected(): boolean {
    return this.streamOpen;
  }

  start(): void {
    if (this.loop) {
      return;
    }

    this.shouldStop = false;
    this.loop = this.run().finally(() => {
      this.loop = null;
    });
  }

  /** Aborts the open request and waits, up to `timeoutMs`, for the loop to exit. */
  async stop(timeoutMs = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
    this.shouldStop = true;
    this.controller?.abort();
    this.wakeRetry?.();

    const loop = this.loop;
    if (!loop) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    await Promise.race([
      loop,
      new Promise<void>((resolve) => {
        timer = setTimeout(resolve, timeoutMs);
      })
    ]);
    clearTimeout(timer);
  }

  private async run(): Promise<void> {
    while (!this.shouldStop) {
      try {
        this.logger.info({ msg: 'sse_connecting', url: this.url });
        await this.readStream();
        if (!this.shouldStop) {
          this.logger.info({ msg: 'sse_connection_closed' });
        }
      } catch (error) {
        if (!this.shouldStop) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn({ msg: 'sse_connection_failed', error: message });
        }
      }

      this.disconnectedSubject.next();

      if (!this.shouldStop) {
        await this.waitBeforeRetry();
      }
    }

    this.logger.info({ msg: 'sse_client_stopped' });
  }

  private async readStream(): Promise<void> {
    const controller = new AbortController();
    this.controller = controller;
    let watchdog: NodeJS.Timeout | undefined;
    const armWatchdog = (): void => {
      clearTimeout(watchdog);
      watchdog = setTimeout(() => {
        controller.abort(new Error(`No data within ${this.readTimeoutMs}ms`));
      }, this.readTimeoutMs);
    };

    armWatchdog();

    try {
      const response = await this.fetchImpl(this.url, {
        headers: {
          Accept: 'text/event-stream',
          'Cache-Control': 'no-cache'
        },
        signal: controller.signal
      });

      if (!response.ok || !response.body) {
        const message = `Connection failed: ${response.status}`;
        this.errorSubject.next(message);
        this.logger.warn({ msg: 'sse_connection_rejected', status: response.status });
        await response.body?.cancel();
        return;
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      const parser = new SseParser();
      this.streamOpen = true;
      this.logger.info({ msg: 'sse_connected' });
      this.connectedSubject.next();

      try {
        while (!this.shouldStop) {
          armWatchdog();
          const { done, value } = await reader.read();

          if (done) {
            break;
          }

          for (const data of parser.feed(decoder.decode(value, { stream: true }))) {
            this.dispatch(data);
          }
        }
      } finally {
        this.streamOpen = false;
        // Cancelling tells the server the subscriber is gone.
        await reader.cancel().catch((error: unknown) => {
          this.logger.debug({
            msg: 'sse_reader_cancel_failed',
            error: error instanceof Error ? error.message : String(error)
          });
        });
      }
    } finally {
      clearTimeout(watchdog);
      this.controller = null;
    }
  }

  private dispatch(data: string): void {
    const event = parseSyncEvent(data);

    if (!event) {
      this.logger.warn({ msg: 'sse_event_malformed', data: data.slice(0, 200) });
      return;
    }

    this.eventSubject.next(event);

    if (!isSyncEvent(event)) {
      this.logger.info({ msg: 'sse_event_unrecognized', type: event.type });
      return;
    }

    switch (event.type) {
      case 'catalog_uploaded':
        this.catalogUploadedSubject.next(event);
        break;
      case 'results_changed':
        this.resultsChangedSubject.next(event);
        break;
      case 'connected':
        // Late joiners learn about a catalog that was uploaded before they subscribed.
        if (event.catalog) {
          this.catalogUploadedSubject.next({
            type: 'catalog_uploaded',
            filename: event.catalog.filename,
            size: event.catalog.size,
            version: event.catalog.version
          });
        }
        break;
    }
  }

  private waitBeforeRetry(): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeRetry = null;
        resolve();
      }, this.retryDelayMs);
      this.wakeRetry = () => {
        clearTimeout(timer);
        this.wakeRetry = null;
        resolve();
      };
    });
  }
}

import { Subject, type Observable } from 'rxjs';
import type { Logger } from '../../shared/src/logger.js';
import type {
  CatalogInfo,
  ConnectedEvent,
  ResultInput,
  ResultRecord,
  ResultUpdate,
  UpsertOutcome
} from '../../shared/src/types.js';
import { ConnectedClientTracker, DEFAULT_CLIENT_STALE_MS } from './connected-clients.js';
import { DEFAULT_SUBSCRIBER_QUEUE_SIZE, EventHub, type EventSubscriber } from './event-hub.js';
import type { ResultStore } from './result-store.js';

export interface CatalogBlob {
  filename: string;
  bytes: Buffer;
  size: number;
  uploadedAt: string;
  version: number;
}

export type DataChangeReason =
  | 'result_recorded'
  | 'result_updated'
  | 'result_deleted'
  | 'results_cleared'
  | 'catalog_uploaded';

export interface DataChange {
  reason: DataChangeReason;
  version: number;
}

export interface SyncServiceOptions {
  logger: Logger;
  clientStaleMs?: number;
  clientSweepIntervalMs?: number;
  subscriberQueueSize?: number;
  now?: () => number;
}

const DEFAULT_CLIENT_SWEEP_INTERVAL_MS = 2_000;

/**
 * Shared state behind the HTTP surface: the results store, the in-memory catalog, the sync
 * version and the live-peer roster. Every accepted mutation that clients must observe bumps
 * the version exactly once and fans a `results_changed` or `catalog_uploaded` event out to
 * open streams.
 *
 * Version and catalog updates run as synchronous read-modify-write sequences with no await
 * in between, so concurrent requests on the event loop never interleave inside one.
 */
export class SyncService {
  private version = 0;
  private catalog: CatalogBlob | null = null;
  private readonly hub: EventHub;
  private readonly clients: ConnectedClientTracker;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sweepIntervalMs: number;
  private sweepHandle: NodeJS.Timeout | null = null;
  private lastReportedCount = 0;
  private readonly dataChangedSubject = new Subject<DataChange>();
  private readonly clientCountChangedSubject = new Subject<number>();

  readonly dataChanged$: Observable<DataChange> = this.dataChangedSubject.asObservable();
  readonly clientCountChanged$: Observable<number> = this.clientCountChangedSubject.asObservable();

  constructor(
    private readonly store: ResultStore,
    options: SyncServiceOptions
  ) {
    this.logger = options.logger;
    this.now = options.now ?? (() => Date.now());
    this.sweepIntervalMs = options.clientSweepIntervalMs ?? DEFAULT_CLIENT_SWEEP_INTERVAL_MS;
    this.clients = new ConnectedClientTracker(options.clientStaleMs ?? DEFAULT_CLIENT_STALE_MS, this.now);
    this.hub = new EventHub(options.subscriberQueueSize ?? DEFAULT_SUBSCRIBER_QUEUE_SIZE);
  }

  start(): void {
    if (this.sweepHandle) {
      return;
    }

    this.sweepHandle = setInterval(() => {
      this.sweepClients();
    }, this.sweepIntervalMs);
    this.sweepHandle.unref();
  }

  stop(): void {
    if (this.sweepHandle) {
      clearInterval(this.sweepHandle);
      this.sweepHandle = null;
    }

    this.hub.closeAll();
    this.dataChangedSubject.complete();
    this.clientCountChangedSubject.complete();
  }

  getVersion(): number {
    return this.version;
  }

  touchClient(address: string): void {
    if (this.clients.touch(address)) {
      const count = this.clients.count();
      this.logger.info({ msg: 'client_connected', address, count });
      this.lastReportedCount = count;
      this.clientCountChangedSubject.next(count);
    }
  }

  connectedClientCount(): number {
    return this.clients.count();
  }

  connectedClientAddresses(): string[] {
    return this.clients.addresses();
  }

  /** Drops stale peers; notifies when the count differs from the previous sweep. */
  sweepClients(): number {
    const count = this.clients.sweep();

    if (count !== this.lastReportedCount) {
      this.lastReportedCount = count;
      this.clientCountChangedSubject.next(count);
    }

    return count;
  }

  recordResult(input: ResultInput): UpsertOutcome {
    const outcome = this.store.upsertResult(input);
    const version = this.bumpVersion();
    this.logger.info({
      msg: 'result_recorded',
      action: outcome.action,
      id: outcome.id,
      client: input.client,
      version
    });
    this.hub.publish({ type: 'results_changed', version });
    this.dataChangedSubject.next({ reason: 'result_recorded', version });
    return outcome;
  }

  getResults(client?: string | null): ResultRecord[] {
    return this.store.getAllResults(client);
  }

  getResult(id: number): ResultRecord | null {
    return this.store.getResultById(id);
  }

  exportByClient(): Record<string, ResultRecord[]> {
    return this.store.exportByClient();
  }

  // Point edits refresh the host but leave the version and the event stream alone.
  updateResult(id: number, fields: ResultUpdate): boolean {
    const updated = this.store.updateResult(id, fields);
    this.dataChangedSubject.next({ reason: 'result_updated', version: this.version });
    return updated;
  }

  deleteResult(id: number): boolean {
    const deleted = this.store.deleteResult(id);
    this.dataChangedSubject.next({ reason: 'result_deleted', version: this.version });
    return deleted;
  }

  clearResults(client?: string | null): number {
    const deleted = this.store.clearResults(client);
    const version = this.bumpVersion();
    this.logger.info({ msg: 'results_cleared', client: client ?? null, deleted, version });
    this.hub.publish({ type: 'results_changed', version });
    this.dataChangedSubject.next({ reason: 'results_cleared', version });
    return deleted;
  }

  listClients(): string[] {
    return this.store.listClients();
  }

  uploadCatalog(filename: string, bytes: Buffer): CatalogInfo {
    const version = this.bumpVersion();
    this.catalog = {
      filename,
      bytes,
      size: bytes.length,
      uploadedAt: new Date(this.now()).toISOString(),
      version
    };
    this.logger.info({ msg: 'catalog_uploaded', filename, size: bytes.length, version });
    this.hub.publish({ type: 'catalog_uploaded', filename, size: bytes.length, version });
    this.dataChangedSubject.next({ reason: 'catalog_uploaded', version });
    return toCatalogInfo(this.catalog);
  }

  getCatalog(): CatalogBlob | null {
    return this.catalog;
  }

  getCatalogInfo(): CatalogInfo | null {
    return this.catalog ? toCatalogInfo(this.catalog) : null;
  }

  /**
   * Registers a stream and builds its greeting from the same state snapshot, so nothing
   * published after the greeting is missed and nothing before it is replayed.
   */
  openEventStream(): { subscriber: EventSubscriber; greeting: ConnectedEvent } {
    const subscriber = this.hub.subscribe();
    const greeting: ConnectedEvent = { type: 'connected', version: this.version };

    if (this.catalog) {
      greeting.catalog = {
        filename: this.catalog.filename,
        size: this.catalog.size,
        version: this.catalog.version
      };
    }

    this.logger.debug({ msg: 'event_stream_opened', subscriber: subscriber.id, open: this.hub.size });
    return { subscriber, greeting };
  }

  closeEventStreams(): void {
    this.hub.closeAll();
  }

  eventStreamCount(): number {
    return this.hub.size;
  }

  private bumpVersion(): number {
    this.version += 1;
    return this.version;
  }
}

function toCatalogInfo(catalog: CatalogBlob): CatalogInfo {
  return {
    exists: true,
    filename: catalog.filename,
    size: catalog.size,
    uploaded_at: catalog.uploadedAt,
    version: catalog.version
  };
}

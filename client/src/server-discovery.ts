import dgram from 'node:dgram';
import { Subject, type Observable } from 'rxjs';
import type { Logger } from '../../shared/src/logger.js';
import { DISCOVERY_PORT, DISCOVERY_STALE_MS, parseDiscoveryPacket } from '../../shared/src/discovery.js';

export interface DiscoveredServer {
  ip: string;
  port: number;
  name: string;
  lastSeen: number;
  url: string;
}

export interface ServerDiscoveryOptions {
  logger: Logger;
  port?: number;
  bindAddress?: string;
  staleMs?: number;
  now?: () => number;
}

/**
 * Collects server announcements into a map keyed by `ip:port`. Entries expire after
 * `staleMs` without a fresh announcement; a server heard again after expiring counts as
 * newly found.
 */
export class ServerDiscovery {
  private socket: dgram.Socket | null = null;
  private readonly servers = new Map<string, DiscoveredServer>();
  private readonly serverFoundSubject = new Subject<DiscoveredServer>();
  private readonly logger: Logger;
  private readonly staleMs: number;
  private readonly now: () => number;

  readonly serverFound$: Observable<DiscoveredServer> = this.serverFoundSubject.asObservable();

  constructor(private readonly options: ServerDiscoveryOptions) {
    this.logger = options.logger.child({ component: 'discovery_listener' });
    this.staleMs = options.staleMs ?? DISCOVERY_STALE_MS;
    this.now = options.now ?? (() => Date.now());
  }

  isRunning(): boolean {
    return this.socket !== null;
  }

  /** Port actually bound; differs from the configured one when that was 0. */
  boundPort(): number | null {
    return this.socket ? this.socket.address().port : null;
  }

  async start(): Promise<void> {
    if (this.socket) {
      return;
    }

    const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });
    socket.on('message', (message, remote) => {
      this.ingest(message, remote.address);
    });

    await new Promise<void>((resolve, reject) => {
      socket.once('error', reject);
      socket.bind(
        { port: this.options.port ?? DISCOVERY_PORT, address: this.options.bindAddress ?? '0.0.0.0' },
        () => {
          socket.off('error', reject);
          resolve();
        }
      );
    });

    socket.setBroadcast(true);
    socket.on('error', (error) => {
      this.logger.error({ msg: 'discovery_listen_failed', error: error.message });
      void this.stop();
    });
    this.socket = socket;
    this.logger.info({ msg: 'discovery_listening', port: socket.address().port });
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    this.socket = null;

    if (socket) {
      await new Promise<void>((resolve) => {
        socket.close(() => resolve());
      });
      this.logger.info({ msg: 'discovery_stopped' });
    }
  }

  /** Applies one received datagram; malformed or foreign payloads are ignored. */
  ingest(data: Buffer | string, sourceAddress: string): void {
    const packet = parseDiscoveryPacket(data, sourceAddress);

    if (!packet) {
      this.logger.debug({ msg: 'discovery_packet_ignored', from: sourceAddress });
      return;
    }

    const seenAt = this.now();
    const ips = packet.ips && packet.ips.length > 0 ? packet.ips : [packet.ip];

    for (const ip of ips) {
      const key = `${ip}:${packet.port}`;
      const previous = this.servers.get(key);
      const server: DiscoveredServer = {
        ip,
        port: packet.port,
        name: packet.name,
        lastSeen: seenAt,
        url: `http://${ip}:${packet.port}`
      };
      this.servers.set(key, server);

      if (!previous || this.isStale(previous, seenAt)) {
        this.logger.info({ msg: 'server_discovered', url: server.url, name: server.name });
        this.serverFoundSubject.next(server);
      }
    }
  }

  /** Live servers only; stale entries are pruned first. */
  getDiscoveredServers(): DiscoveredServer[] {
    const now = this.now();

    for (const [key, server] of this.servers) {
      if (this.isStale(server, now)) {
        this.servers.delete(key);
      }
    }

    return [...this.servers.values()];
  }

  /** Resolves with a live server, waiting up to `timeoutMs` for one to announce itself. */
  waitForServer(timeoutMs: number): Promise<DiscoveredServer | null> {
    const known = this.getDiscoveredServers()[0];

    if (known) {
      return Promise.resolve(known);
    }

    return new Promise((resolve) => {
      const subscription = this.serverFound$.subscribe((server) => {
        clearTimeout(timer);
        subscription.unsubscribe();
        resolve(server);
      });
      const timer = setTimeout(() => {
        subscription.unsubscribe();
        resolve(null);
      }, timeoutMs);
    });
  }

  private isStale(server: DiscoveredServer, now: number): boolean {
    return now - server.lastSeen > this.staleMs;
  }
}

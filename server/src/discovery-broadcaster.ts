import dgram from 'node:dgram';
import type { Logger } from '../../shared/src/logger.js';
import {
  BROADCAST_INTERVAL_MS,
  DISCOVERY_PACKET_TYPE,
  DISCOVERY_PORT,
  broadcastAddressFor,
  encodeDiscoveryPacket,
  type DiscoveryPacket
} from '../../shared/src/discovery.js';
import { getLocalAddresses } from './server-address.js';

export interface ServerBroadcasterOptions {
  logger: Logger;
  discoveryPort?: number;
  intervalMs?: number;
  /** Destination addresses; defaults to the `.255` broadcast address of each local interface. */
  targets?: string[];
  resolveAddresses?: () => string[];
}

/**
 * Announces the server on the LAN. A failed send ends the broadcast loop; the HTTP server
 * keeps running without it.
 */
export class ServerBroadcaster {
  private socket: dgram.Socket | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly logger: Logger;
  private readonly discoveryPort: number;
  private readonly intervalMs: number;
  private readonly resolveAddresses: () => string[];
  private sentCount = 0;

  constructor(
    private readonly port: number,
    private readonly serverName: string,
    private readonly options: ServerBroadcasterOptions
  ) {
    this.logger = options.logger.child({ component: 'discovery_broadcaster' });
    this.discoveryPort = options.discoveryPort ?? DISCOVERY_PORT;
    this.intervalMs = options.intervalMs ?? BROADCAST_INTERVAL_MS;
    this.resolveAddresses = options.resolveAddresses ?? getLocalAddresses;
  }

  isRunning(): boolean {
    return this.socket !== null;
  }

  get broadcastsSent(): number {
    return this.sentCount;
  }

  buildPacket(): DiscoveryPacket {
    const addresses = this.resolveAddresses();
    const ips = addresses.length > 0 ? addresses : ['127.0.0.1'];

    return {
      type: DISCOVERY_PACKET_TYPE,
      ip: ips[0],
      ips,
      port: this.port,
      name: this.serverName
    };
  }

  async start(): Promise<void> {
    if (this.socket) {
      return;
    }

    const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });
    this.socket = socket;
    socket.on('error', (error) => {
      this.fail(error);
    });

    await new Promise<void>((resolve, reject) => {
      socket.once('error', reject);
      socket.bind(0, () => {
        socket.off('error', reject);
        resolve();
      });
    });
    socket.setBroadcast(true);

    const packet = this.buildPacket();
    const targets = this.options.targets ?? [...new Set((packet.ips ?? [packet.ip]).map(broadcastAddressFor))];
    this.logger.info({
      msg: 'discovery_broadcast_started',
      targets,
      discoveryPort: this.discoveryPort,
      port: this.port
    });

    this.broadcast(packet, targets);
    this.timer = setInterval(() => {
      this.broadcast(this.buildPacket(), targets);
    }, this.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const socket = this.socket;
    this.socket = null;

    if (socket) {
      await new Promise<void>((resolve) => {
        socket.close(() => resolve());
      });
      this.logger.info({ msg: 'discovery_broadcast_stopped', sent: this.sentCount });
    }
  }

  private broadcast(packet: DiscoveryPacket, targets: string[]): void {
    const socket = this.socket;

    if (!socket) {
      return;
    }

    const message = encodeDiscoveryPacket(packet);

    for (const target of targets) {
      socket.send(message, this.discoveryPort, target, (error) => {
        if (error) {
          this.fail(error, target);
          return;
        }
        this.sentCount += 1;
      });
    }
  }

  private fail(error: Error, target?: string): void {
    if (!this.socket) {
      return;
    }

    this.logger.error({ msg: 'discovery_broadcast_failed', target: target ?? null, error: error.message });
    void this.stop();
  }
}

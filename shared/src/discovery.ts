import { isRecord } from './guards.js';

export const DISCOVERY_PORT = 8888;
export const BROADCAST_INTERVAL_MS = 3_000;
export const DISCOVERY_STALE_MS = 5_000;
export const DISCOVERY_PACKET_TYPE = 'gearledger_server';
export const DEFAULT_SERVER_PORT = 8080;
export const DEFAULT_SERVER_NAME = 'GearLedger Server';

export interface DiscoveryPacket {
  type: typeof DISCOVERY_PACKET_TYPE;
  ip: string;
  ips?: string[];
  port: number;
  name: string;
}

export function encodeDiscoveryPacket(packet: DiscoveryPacket): Buffer {
  return Buffer.from(JSON.stringify(packet), 'utf8');
}

/**
 * Returns null for anything that is not a well-formed announcement. `fallbackIp` is the
 * datagram's source address, used when the packet names no address of its own.
 */
export function parseDiscoveryPacket(data: Buffer | string, fallbackIp: string): DiscoveryPacket | null {
  let parsed: unknown;

  try {
    parsed = JSON.parse(typeof data === 'string' ? data : data.toString('utf8'));
  } catch {
    return null;
  }

  if (!isRecord(parsed)) {
    return null;
  }

  const message = parsed;

  if (message.type !== DISCOVERY_PACKET_TYPE) {
    return null;
  }

  const ip = typeof message.ip === 'string' && message.ip.trim().length > 0 ? message.ip.trim() : fallbackIp;
  const ips = Array.isArray(message.ips)
    ? message.ips.filter((value): value is string => typeof value === 'string' && value.trim().length > 0)
    : [];
  const port =
    typeof message.port === 'number' && Number.isInteger(message.port) && message.port > 0 && message.port < 65536
      ? message.port
      : DEFAULT_SERVER_PORT;
  const name = typeof message.name === 'string' && message.name.trim().length > 0 ? message.name : DEFAULT_SERVER_NAME;

  return {
    type: DISCOVERY_PACKET_TYPE,
    ip,
    ...(ips.length > 0 ? { ips } : {}),
    port,
    name
  };
}

export function broadcastAddressFor(ip: string): string {
  const parts = ip.split('.');

  if (parts.length === 4 && parts.every((part) => /^\d{1,3}$/.test(part))) {
    return `${parts[0]}.${parts[1]}.${parts[2]}.255`;
  }

  return '255.255.255.255';
}

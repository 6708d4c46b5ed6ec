import os from 'node:os';

/** Non-internal IPv4 addresses of this host, sorted; link-local addresses are skipped. */
export function getLocalAddresses(): string[] {
  const addresses = new Set<string>();

  for (const entries of Object.values(os.networkInterfaces())) {
    for (const entry of entries ?? []) {
      if (entry.family !== 'IPv4' || entry.internal || entry.address.startsWith('169.254.')) {
        continue;
      }
      addresses.add(entry.address);
    }
  }

  return [...addresses].sort();
}

export function getServerUrl(port: number, addresses = getLocalAddresses()): string {
  return `http://${addresses[0] ?? '127.0.0.1'}:${port}`;
}

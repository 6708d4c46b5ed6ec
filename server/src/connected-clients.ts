export const DEFAULT_CLIENT_STALE_MS = 10_000;

/**
 * Liveness heuristic keyed by peer address. Several logical clients behind one address
 * count as one.
 */
export class ConnectedClientTracker {
  private readonly lastSeenByAddress = new Map<string, number>();

  constructor(
    private readonly staleMs = DEFAULT_CLIENT_STALE_MS,
    private readonly now: () => number = () => Date.now()
  ) {}

  /** Returns true when the address was not being tracked. */
  touch(address: string): boolean {
    const key = normalizeAddress(address);
    const isNew = !this.lastSeenByAddress.has(key);
    this.lastSeenByAddress.set(key, this.now());
    return isNew;
  }

  sweep(): number {
    const cutoff = this.now() - this.staleMs;

    for (const [address, lastSeen] of this.lastSeenByAddress) {
      if (lastSeen < cutoff) {
        this.lastSeenByAddress.delete(address);
      }
    }

    return this.lastSeenByAddress.size;
  }

  count(): number {
    return this.lastSeenByAddress.size;
  }

  addresses(): string[] {
    return [...this.lastSeenByAddress.keys()];
  }
}

function normalizeAddress(address: string): string {
  const trimmed = String(address ?? '').trim();

  if (trimmed.startsWith('::ffff:')) {
    return trimmed.slice('::ffff:'.length);
  }

  return trimmed.length > 0 ? trimmed : 'unknown';
}

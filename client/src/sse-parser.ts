import { isRecord } from '../../shared/src/guards.js';
import type { SyncNotification } from '../../shared/src/types.js';

/**
 * Incremental `text/event-stream` reader. Feed decoded chunks; each blank line closes an
 * event and yields its `data:` payload. Comment lines (keepalives) and other fields are
 * skipped.
 */
export class SseParser {
  private partialLine = '';
  private dataLines: string[] = [];

  feed(chunk: string): string[] {
    const completed: string[] = [];
    const lines = (this.partialLine + chunk).split(/\r\n|\r|\n/);
    this.partialLine = lines.pop() ?? '';

    for (const line of lines) {
      if (line.length === 0) {
        if (this.dataLines.length > 0) {
          completed.push(this.dataLines.join('\n'));
          this.dataLines = [];
        }
        continue;
      }

      if (line.startsWith(':')) {
        continue;
      }

      if (line.startsWith('data:')) {
        const value = line.slice('data:'.length);
        this.dataLines.push(value.startsWith(' ') ? value.slice(1) : value);
      }
    }

    return completed;
  }

  reset(): void {
    this.partialLine = '';
    this.dataLines = [];
  }
}

/** Accepts any JSON object with a string `type`, known or not. */
export function parseSyncEvent(data: string): SyncNotification | null {
  try {
    const parsed: unknown = JSON.parse(data);
    return isRecord(parsed) && typeof parsed.type === 'string' ? { ...parsed, type: parsed.type } : null;
  } catch {
    return null;
  }
}

import type { Logger } from '../../shared/src/logger.js';
import { isCatalogInfo, isRecord, isResultRecord } from '../../shared/src/guards.js';
import type {
  ApiResult,
  CatalogInfo,
  ResultInput,
  ResultRecord,
  ResultUpdate,
  UpsertOutcome
} from '../../shared/src/types.js';

export interface SyncApiClientOptions {
  timeoutMs?: number;
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

interface RequestOptions {
  query?: Record<string, string | null | undefined>;
  json?: unknown;
  body?: FormData;
}

type JsonObject = Record<string, unknown>;

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Request/response access to a sync server. Transport failures never throw: wrappers
 * return `{ ok: false, error }`, or the documented sentinel for scalar answers.
 */
export class SyncApiClient {
  readonly serverUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger | undefined;
  private connected = false;

  constructor(serverUrl: string, options: SyncApiClientOptions = {}) {
    this.serverUrl = normalizeBaseUrl(serverUrl);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger;
  }

  /** Probes status, then version so the server counts this peer as connected. */
  async checkConnection(): Promise<boolean> {
    const status = await this.request('GET', '/api/status');

    if (!status.ok) {
      this.connected = false;
      return false;
    }

    const version = await this.request('GET', '/api/sync/version');
    if (!version.ok) {
      this.logger?.debug({ msg: 'version_probe_failed', error: version.error });
    }

    this.connected = true;
    return true;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async addOrUpdateResult(input: ResultInput): Promise<ApiResult<Omit<UpsertOutcome, 'ok'>>> {
    const response = await this.request('POST', '/api/results', {
      json: {
        quantity: 1,
        weight: 0,
        brand: '',
        description: '',
        sale_price: 0,
        ...input
      }
    });

    if (!response.ok) {
      return response;
    }

    const action = response.action;
    const id = response.id;

    if ((action !== 'inserted' && action !== 'updated') || typeof id !== 'number') {
      return { ok: false, error: 'Malformed response' };
    }

    return { ok: true, action, id };
  }

  async getAllResults(client?: string | null): Promise<ApiResult<{ results: ResultRecord[] }>> {
    const response = await this.request('GET', '/api/results', { query: { client } });
    return response.ok ? { ok: true, results: readResults(response.results) } : response;
  }

  async getResultById(id: number): Promise<ResultRecord | null> {
    const response = await this.request('GET', `/api/results/${id}`);
    return response.ok && isResultRecord(response.result) ? response.result : null;
  }

  async updateResult(id: number, fields: ResultUpdate): Promise<boolean> {
    const response = await this.request('PUT', `/api/results/${id}`, { json: fields });
    return response.ok;
  }

  async deleteResult(id: number): Promise<boolean> {
    const response = await this.request('DELETE', `/api/results/${id}`);
    return response.ok;
  }

  async clearAllResults(client?: string | null): Promise<ApiResult<{ deleted: number }>> {
    const response = await this.request('POST', '/api/results/clear', {
      json: client ? { client } : {}
    });
    return response.ok ? { ok: true, deleted: readInteger(response.deleted, 0) } : response;
  }

  /** Current server version, or -1 when the server cannot be reached. */
  async getSyncVersion(): Promise<number> {
    const response = await this.request('GET', '/api/sync/version');
    return response.ok ? readInteger(response.version, -1) : -1;
  }

  async getClients(): Promise<ApiResult<{ clients: string[] }>> {
    const response = await this.request('GET', '/api/clients');

    if (!response.ok) {
      return response;
    }

    const clients = Array.isArray(response.clients)
      ? response.clients.filter((value): value is string => typeof value === 'string')
      : [];
    return { ok: true, clients };
  }

  async getConnectedClientCount(): Promise<ApiResult<{ count: number }>> {
    const response = await this.request('GET', '/api/clients/count');
    return response.ok ? { ok: true, count: readInteger(response.count, 0) } : response;
  }

  async exportByClient(): Promise<ApiResult<{ clients: Record<string, ResultRecord[]> }>> {
    const response = await this.request('GET', '/api/results/export');

    if (!response.ok) {
      return response;
    }

    const grouped: Record<string, ResultRecord[]> = {};
    if (isRecord(response.clients)) {
      for (const [client, rows] of Object.entries(response.clients)) {
        grouped[client] = readResults(rows);
      }
    }

    return { ok: true, clients: grouped };
  }

  async getCatalogInfo(): Promise<ApiResult<CatalogInfo | { exists: false }>> {
    const response = await this.request('GET', '/api/catalog/info');

    if (!response.ok) {
      return response;
    }

    if (!isCatalogInfo(response)) {
      return { ok: true, exists: false };
    }

    return {
      ok: true,
      exists: true,
      filename: response.filename,
      size: response.size,
      uploaded_at: typeof response.uploaded_at === 'string' ? response.uploaded_at : '',
      version: response.version
    };
  }

  async uploadCatalog(
    filename: string,
    bytes: Uint8Array
  ): Promise<ApiResult<{ filename: string; size: number; version: number }>> {
    const form = new FormData();
    form.append('file', new Blob([bytes]), filename);
    const response = await this.request('POST', '/api/catalog', { body: form });

    if (!response.ok) {
      return response;
    }

    return {
      ok: true,
      filename: typeof response.filename === 'string' ? response.filename : filename,
      size: readInteger(response.size, bytes.length),
      version: readInteger(response.version, -1)
    };
  }

  async downloadCatalog(): Promise<ApiResult<{ filename: string; bytes: Buffer }>> {
    try {
      const response = await this.fetchImpl(this.buildUrl('/api/catalog'), {
        method: 'GET',
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (!response.ok) {
        const payload = await readJsonObject(response);
        return { ok: false, error: readError(payload, response.status) };
      }

      const bytes = Buffer.from(await response.arrayBuffer());
      const filename = parseAttachmentFilename(response.headers.get('content-disposition')) ?? 'catalog';
      return { ok: true, filename, bytes };
    } catch (error) {
      return this.transportFailure('GET', '/api/catalog', error);
    }
  }

  private async request(
    method: string,
    path: string,
    options: RequestOptions = {}
  ): Promise<({ ok: true } & JsonObject) | { ok: false; error: string }> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    let body: string | FormData | undefined;

    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    } else if (options.body) {
      body = options.body;
    }

    try {
      const response = await this.fetchImpl(this.buildUrl(path, options.query), {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      const payload = await readJsonObject(response);

      if (!response.ok || payload.ok === false) {
        return { ok: false, error: readError(payload, response.status) };
      }

      return { ...payload, ok: true };
    } catch (error) {
      return this.transportFailure(method, path, error);
    }
  }

  private transportFailure(method: string, path: string, error: unknown): { ok: false; error: string } {
    const message = error instanceof Error ? error.message : String(error);
    this.logger?.debug({ msg: 'sync_request_failed', method, path, error: message });
    return { ok: false, error: message };
  }

  private buildUrl(path: string, query: RequestOptions['query'] = {}): string {
    const url = new URL(`${this.serverUrl}${path}`);

    for (const [key, value] of Object.entries(query)) {
      if (value) {
        url.searchParams.set(key, value);
      }
    }

    return url.toString();
  }
}

/** Returns a client only when the server answers its status probe. */
export async function connectToServer(
  serverUrl: string,
  options: SyncApiClientOptions = {}
): Promise<SyncApiClient | null> {
  const client = new SyncApiClient(serverUrl, options);
  return (await client.checkConnection()) ? client : null;
}

export function normalizeBaseUrl(value: string): string {
  return value.trim().replace(/\/+$/, '');
}

export function parseAttachmentFilename(header: string | null): string | null {
  if (!header) {
    return null;
  }

  const extended = /filename\*=UTF-8''([^;]+)/i.exec(header);
  if (extended) {
    try {
      return decodeURIComponent(extended[1]);
    } catch {
      return extended[1];
    }
  }

  const plain = /filename="([^"]*)"/i.exec(header) ?? /filename=([^;]+)/i.exec(header);
  return plain ? plain[1].trim() : null;
}

async function readJsonObject(response: Response): Promise<JsonObject> {
  const text = await response.text();

  if (text.length === 0) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function readError(payload: JsonObject, status: number): string {
  return typeof payload.error === 'string' && payload.error.length > 0 ? payload.error : `HTTP ${status}`;
}

function readResults(value: unknown): ResultRecord[] {
  return Array.isArray(value) ? value.filter(isResultRecord) : [];
}

function readInteger(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) ? value : fallback;
}

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  UPDATABLE_RESULT_FIELDS,
  type ResultInput,
  type ResultUpdate,
  type ServerStatus
} from '../../shared/src/types.js';
import { DEFAULT_SERVER_NAME } from '../../shared/src/discovery.js';
import { DEFAULT_SSE_KEEPALIVE_MS, pumpEventStream } from './sse.js';
import type { SyncService } from './sync-service.js';

export const SERVER_API_VERSION = '1.0.0';
const ONE_MINUTE = '1 minute';

export interface SyncRouteOptions {
  keepaliveMs?: number;
  catalogUploadMaxPerMinute?: number;
}

interface IdParams {
  id: string;
}

interface ResultsQuery {
  client?: string;
}

const INVALID_QUANTITY_ERROR = 'quantity must be a non-negative integer';
const STRING_RESULT_FIELDS = new Set(['artikul', 'client', 'brand', 'description']);
const INTEGER_RESULT_FIELDS = new Set(['quantity']);

/** Expects `@fastify/rate-limit` registered with `global: false`; only catalog uploads are limited. */
export function registerSyncRoutes(
  app: FastifyInstance,
  service: SyncService,
  options: SyncRouteOptions = {}
): void {
  const keepaliveMs = options.keepaliveMs ?? DEFAULT_SSE_KEEPALIVE_MS;

  app.get('/api/status', async (): Promise<ServerStatus> => {
    return {
      status: 'ok',
      server: DEFAULT_SERVER_NAME,
      version: SERVER_API_VERSION
    };
  });

  app.get('/api/sync/version', async (request) => {
    service.touchClient(request.ip);
    return { ok: true, version: service.getVersion() };
  });

  app.get('/api/events', (request, reply) => {
    reply.hijack();
    const response = reply.raw;
    response.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no'
    });

    const { subscriber, greeting } = service.openEventStream();
    const closeSubscriber = (): void => {
      subscriber.close();
    };
    request.raw.on('close', closeSubscriber);
    response.on('close', closeSubscriber);
    response.on('error', (error) => {
      request.log.debug({ msg: 'event_stream_write_failed', error: error.message });
      subscriber.close();
    });

    pumpEventStream(subscriber, response, greeting, keepaliveMs)
      .catch((error: unknown) => {
        request.log.warn({
          msg: 'event_stream_failed',
          error: error instanceof Error ? error.message : String(error)
        });
      })
      .finally(() => {
        request.log.debug({ msg: 'event_stream_closed', subscriber: subscriber.id });
      });
  });

  app.get<{ Querystring: ResultsQuery }>('/api/results', async (request) => {
    service.touchClient(request.ip);
    const client = normalizeOptionalString(request.query.client);
    return { ok: true, results: service.getResults(client) };
  });

  app.post('/api/results', async (request, reply) => {
    service.touchClient(request.ip);

    if (!isObjectBody(request.body)) {
      return sendError(reply, 400, 'No data provided');
    }

    const input = normalizeResultInput(request.body);

    if (!input) {
      return sendError(reply, 400, 'artikul and client required');
    }

    return service.recordResult(input);
  });

  app.get('/api/results/export', async () => {
    return { ok: true, clients: service.exportByClient() };
  });

  app.post('/api/results/clear', async (request) => {
    const body = isObjectBody(request.body) ? request.body : {};
    const deleted = service.clearResults(normalizeOptionalString(body.client));
    return { ok: true, deleted };
  });

  app.get<{ Params: IdParams }>('/api/results/:id', async (request, reply) => {
    const id = parseResultId(request.params.id);

    if (id === null) {
      return sendError(reply, 400, 'Invalid result id');
    }

    const result = service.getResult(id);

    if (!result) {
      return sendError(reply, 404, 'Not found');
    }

    return { ok: true, result };
  });

  app.put<{ Params: IdParams }>('/api/results/:id', async (request, reply) => {
    const id = parseResultId(request.params.id);

    if (id === null) {
      return sendError(reply, 400, 'Invalid result id');
    }

    if (!isObjectBody(request.body) || Object.keys(request.body).length === 0) {
      return sendError(reply, 400, 'No data provided');
    }

    return { ok: service.updateResult(id, normalizeResultUpdate(request.body)) };
  });

  app.delete<{ Params: IdParams }>('/api/results/:id', async (request, reply) => {
    const id = parseResultId(request.params.id);

    if (id === null) {
      return sendError(reply, 400, 'Invalid result id');
    }

    return { ok: service.deleteResult(id) };
  });

  app.get('/api/clients', async () => {
    return { ok: true, clients: service.listClients() };
  });

  app.get('/api/clients/count', async () => {
    return { ok: true, count: service.connectedClientCount() };
  });

  app.get('/api/catalog/info', async () => {
    const info = service.getCatalogInfo();
    return info ? { ok: true, ...info } : { ok: true, exists: false };
  });

  app.get('/api/catalog', async (_request, reply) => {
    const catalog = service.getCatalog();

    if (!catalog) {
      return sendError(reply, 404, 'No catalog uploaded');
    }

    reply.header('Content-Type', 'application/octet-stream');
    reply.header('Content-Length', String(catalog.size));
    reply.header('Content-Disposition', buildAttachmentDisposition(catalog.filename));
    return reply.send(catalog.bytes);
  });

  app.route({
    method: 'POST',
    url: '/api/catalog',
    config: {
      rateLimit: {
        max: options.catalogUploadMaxPerMinute ?? 30,
        timeWindow: ONE_MINUTE
      }
    },
    handler: async (request, reply) => {
      if (!request.isMultipart()) {
        return sendError(reply, 400, 'No file provided');
      }

      const file = await request.file();

      if (!file) {
        return sendError(reply, 400, 'No file provided');
      }

      const filename = file.filename.trim();

      if (filename.length === 0) {
        file.file.resume();
        return sendError(reply, 400, 'No file selected');
      }

      let bytes: Buffer;
      try {
        bytes = await file.toBuffer();
      } catch (error) {
        if (error instanceof app.multipartErrors.RequestFileTooLargeError) {
          return sendError(reply, 413, 'Catalog file too large');
        }
        throw error;
      }

      const info = service.uploadCatalog(filename, bytes);
      return { ok: true, filename: info.filename, size: info.size, version: info.version };
    }
  });
}

/** Rejected result payload; the app error handler answers it with 400. */
export class ResultValidationError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ResultValidationError';
  }
}

function sendError(reply: FastifyReply, statusCode: number, error: string): FastifyReply {
  return reply.code(statusCode).send({ ok: false, error });
}

function isObjectBody(body: FastifyRequest['body']): body is Record<string, unknown> {
  return Boolean(body) && typeof body === 'object' && !Array.isArray(body);
}

export function normalizeResultInput(body: Record<string, unknown>): ResultInput | null {
  const artikul = normalizeRequiredString(body.artikul);
  const client = normalizeRequiredString(body.client);

  if (!artikul || !client) {
    return null;
  }

  return {
    artikul,
    client,
    quantity: readQuantity(body.quantity, 1),
    weight: readNumber(body.weight, 0),
    brand: typeof body.brand === 'string' ? body.brand : '',
    description: typeof body.description === 'string' ? body.description : '',
    sale_price: readNumber(body.sale_price, 0)
  };
}

/** Keeps allow-listed fields only, coerced to the column's type; anything unusable is dropped, a negative quantity throws. */
export function normalizeResultUpdate(body: Record<string, unknown>): ResultUpdate {
  const update: ResultUpdate = {};

  for (const field of UPDATABLE_RESULT_FIELDS) {
    const value = body[field];

    if (value === undefined || value === null) {
      continue;
    }

    if (STRING_RESULT_FIELDS.has(field)) {
      if (typeof value === 'string') {
        update[field] = value;
      }
      continue;
    }

    if (INTEGER_RESULT_FIELDS.has(field)) {
      const quantity = readQuantity(value, Number.NaN);

      if (Number.isFinite(quantity)) {
        update[field] = quantity;
      }
      continue;
    }

    const numeric = readNumber(value, Number.NaN);

    if (Number.isFinite(numeric)) {
      update[field] = numeric;
    }
  }

  return update;
}

export function parseResultId(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }

  const id = Number.parseInt(value, 10);
  return Number.isSafeInteger(id) ? id : null;
}

export function buildAttachmentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

function normalizeRequiredString(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  const normalized = typeof value === 'string' ? value.trim() : '';
  return normalized.length > 0 ? normalized : null;
}

function normalizeOptionalString(value: unknown): string | null {
  const normalized = typeof value === 'string' ? value.trim() : '';
  return normalized.length > 0 ? normalized : null;
}

/** Throws `ResultValidationError` for negative quantities; fractions are truncated. */
function readQuantity(value: unknown, fallback: number): number {
  const quantity = readNumber(value, fallback);

  if (quantity < 0) {
    throw new ResultValidationError(INVALID_QUANTITY_ERROR);
  }

  return Math.trunc(quantity);
}

function readNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }

  return fallback;
}

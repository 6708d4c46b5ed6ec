import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import { registerSyncRoutes } from './sync-routes.js';
import type { SyncService } from './sync-service.js';

export interface AppOptions {
  logger: FastifyBaseLogger;
  bodyLimitBytes?: number;
  catalogMaxBytes?: number;
  catalogUploadMaxPerMinute?: number;
  keepaliveMs?: number;
  /** Empty allows every origin, which is what a LAN-only deployment expects. */
  corsAllowedOrigins?: string[];
}

const DEFAULT_CATALOG_MAX_BYTES = 50 * 1024 * 1024;

export async function buildApp(service: SyncService, options: AppOptions): Promise<FastifyInstance> {
  const corsAllowedOrigins = options.corsAllowedOrigins ?? [];
  const app = Fastify({
    bodyLimit: options.bodyLimitBytes ?? 1024 * 1024,
    loggerInstance: options.logger
  });

  await app.register(cors, {
    origin: (origin, callback) => {
      if (!origin || corsAllowedOrigins.length === 0) {
        callback(null, true);
        return;
      }

      callback(null, corsAllowedOrigins.includes(origin));
    }
  });

  await app.register(multipart, {
    limits: {
      files: 1,
      fileSize: options.catalogMaxBytes ?? DEFAULT_CATALOG_MAX_BYTES
    }
  });

  await app.register(rateLimit, {
    global: false
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode =
      typeof error.statusCode === 'number' && error.statusCode >= 400 ? error.statusCode : 500;

    if (statusCode >= 500) {
      request.log.error({ msg: 'request_failed', url: request.url, error: error.message });
    } else {
      request.log.warn({ msg: 'request_rejected', url: request.url, statusCode, error: error.message });
    }

    reply.code(statusCode).send({
      ok: false,
      error: statusCode >= 500 ? 'Internal server error' : error.message
    });
  });

  app.setNotFoundHandler((request, reply) => {
    reply.code(404).send({
      ok: false,
      error: 'Not found',
      path: request.url
    });
  });

  // Open event streams would otherwise hold the server open on close.
  app.addHook('preClose', async () => {
    service.closeEventStreams();
  });

  registerSyncRoutes(app, service, {
    keepaliveMs: options.keepaliveMs,
    catalogUploadMaxPerMinute: options.catalogUploadMaxPerMinute
  });

  return app;
}

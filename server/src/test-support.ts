import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { FastifyInstance } from 'fastify';
import { createSilentLogger } from '../../shared/src/logger.js';
import { buildApp, type AppOptions } from './app.js';
import { ResultStore } from './result-store.js';
import { SyncService, type SyncServiceOptions } from './sync-service.js';

export interface TempStore {
  store: ResultStore;
  dir: string;
  cleanup: () => void;
}

export function openTempStore(now?: () => number): TempStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gearledger-sync-'));
  const store = ResultStore.open(path.join(dir, 'results.db'), { busyTimeoutMs: 2_000, now });

  return {
    store,
    dir,
    cleanup: () => {
      store.close();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  };
}

export interface TestServer {
  app: FastifyInstance;
  service: SyncService;
  store: ResultStore;
  /** Base URL once `listen()` has been called. */
  url: string;
  listen: () => Promise<string>;
  close: () => Promise<void>;
}

export async function createTestServer(
  options: {
    app?: Partial<Omit<AppOptions, 'logger'>>;
    service?: Partial<Omit<SyncServiceOptions, 'logger'>>;
  } = {}
): Promise<TestServer> {
  const temp = openTempStore(options.service?.now);
  const logger = createSilentLogger();
  const service = new SyncService(temp.store, { ...options.service, logger });
  const app = await buildApp(service, { ...options.app, logger });

  const server: TestServer = {
    app,
    service,
    store: temp.store,
    url: '',
    listen: async () => {
      const address = await app.listen({ host: '127.0.0.1', port: 0 });
      server.url = address;
      return address;
    },
    close: async () => {
      await app.close();
      service.stop();
      temp.cleanup();
    }
  };

  return server;
}

import { createLogger } from '../../shared/src/logger.js';
import { buildApp } from './app.js';
import { loadServerConfig } from './config.js';
import { ServerBroadcaster } from './discovery-broadcaster.js';
import { ResultStore } from './result-store.js';
import { getServerUrl } from './server-address.js';
import { SyncService } from './sync-service.js';

async function main(): Promise<void> {
  const config = loadServerConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty, name: 'server' });
  const store = ResultStore.open(config.databasePath, { busyTimeoutMs: config.databaseBusyTimeoutMs });
  logger.info({ msg: 'results_store_opened', path: store.dbPath, journalMode: store.journalMode() });

  const service = new SyncService(store, {
    logger,
    clientStaleMs: config.clientStaleMs,
    clientSweepIntervalMs: config.clientSweepIntervalMs,
    subscriberQueueSize: config.sseQueueSize
  });
  service.clientCountChanged$.subscribe((count) => {
    logger.info({ msg: 'connected_clients_changed', count });
  });

  const app = await buildApp(service, {
    logger,
    bodyLimitBytes: config.requestBodyLimitBytes,
    catalogMaxBytes: config.catalogMaxBytes,
    catalogUploadMaxPerMinute: config.catalogUploadMaxPerMinute,
    keepaliveMs: config.sseKeepaliveMs,
    corsAllowedOrigins: config.corsAllowedOrigins
  });

  const broadcaster = config.discoveryEnabled
    ? new ServerBroadcaster(config.port, config.serverName, {
        logger,
        discoveryPort: config.discoveryPort,
        intervalMs: config.discoveryIntervalMs
      })
    : null;

  app.addHook('onClose', async () => {
    await broadcaster?.stop();
    service.stop();
    store.close();
  });

  await app.listen({
    host: config.host,
    port: config.port
  });
  service.start();
  await broadcaster?.start();
  logger.info({ msg: 'server_ready', url: getServerUrl(config.port), name: config.serverName });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ msg: 'server_shutdown', signal });
    app.close().catch((error: unknown) => {
      logger.error({ msg: 'server_shutdown_failed', error: error instanceof Error ? error.message : String(error) });
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[server] startup_failed', error);
  process.exitCode = 1;
});

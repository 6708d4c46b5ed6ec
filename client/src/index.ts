import { createLogger } from '../../shared/src/logger.js';
import { loadClientConfig } from './config.js';
import { ServerDiscovery } from './server-discovery.js';
import { connectToServer } from './sync-api-client.js';
import { SyncEventStream } from './sync-event-stream.js';

async function main(): Promise<void> {
  const config = loadClientConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty, name: 'client' });
  let serverUrl = config.serverUrl;

  if (!serverUrl) {
    const discovery = new ServerDiscovery({
      logger,
      port: config.discoveryPort,
      staleMs: config.discoveryStaleMs
    });
    await discovery.start();
    const found = await discovery.waitForServer(config.discoveryWaitMs);
    await discovery.stop();

    if (!found) {
      logger.error({ msg: 'no_server_found', waitedMs: config.discoveryWaitMs });
      process.exitCode = 1;
      return;
    }

    serverUrl = found.url;
  }

  const api = await connectToServer(serverUrl, { timeoutMs: config.requestTimeoutMs, logger });

  if (!api) {
    logger.error({ msg: 'server_unreachable', url: serverUrl });
    process.exitCode = 1;
    return;
  }

  logger.info({ msg: 'server_connected', url: api.serverUrl, version: await api.getSyncVersion() });

  const stream = new SyncEventStream(api.serverUrl, {
    logger,
    readTimeoutMs: config.sseReadTimeoutMs,
    retryDelayMs: config.sseRetryDelayMs
  });
  stream.events$.subscribe((event) => {
    logger.info({ msg: 'sync_event', event });
  });
  stream.resultsChanged$.subscribe(() => {
    void api.getAllResults().then((results) => {
      if (results.ok) {
        logger.info({ msg: 'results_refreshed', count: results.results.length });
      } else {
        logger.warn({ msg: 'results_refresh_failed', error: results.error });
      }
    });
  });
  stream.start();

  const shutdown = (): void => {
    stream.stop().catch((error: unknown) => {
      logger.error({ msg: 'client_shutdown_failed', error: error instanceof Error ? error.message : String(error) });
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[client] startup_failed', error);
  process.exitCode = 1;
});

import {
  loadEnvFile,
  readBooleanEnv,
  readEnv,
  readIntegerEnv,
  readPortEnv
} from '../../shared/src/env.js';
import { DISCOVERY_PORT, DISCOVERY_STALE_MS } from '../../shared/src/discovery.js';

export interface ClientConfig {
  serverUrl: string | null;
  requestTimeoutMs: number;
  sseReadTimeoutMs: number;
  sseRetryDelayMs: number;
  discoveryPort: number;
  discoveryStaleMs: number;
  discoveryWaitMs: number;
  logLevel: string;
  logPretty: boolean;
}

export function loadClientConfig(): ClientConfig {
  loadEnvFile();
  const serverUrl = readEnv('SYNC_SERVER_URL');

  return {
    serverUrl: serverUrl.length > 0 ? serverUrl : null,
    requestTimeoutMs: readIntegerEnv('SYNC_REQUEST_TIMEOUT_MS', 10_000),
    sseReadTimeoutMs: readIntegerEnv('SSE_READ_TIMEOUT_MS', 60_000),
    sseRetryDelayMs: readIntegerEnv('SSE_RETRY_DELAY_MS', 5_000),
    discoveryPort: readPortEnv('DISCOVERY_PORT', DISCOVERY_PORT),
    discoveryStaleMs: readIntegerEnv('DISCOVERY_STALE_MS', DISCOVERY_STALE_MS),
    discoveryWaitMs: readIntegerEnv('DISCOVERY_WAIT_MS', 15_000),
    logLevel: readEnv('LOG_LEVEL') || 'info',
    logPretty: readBooleanEnv('LOG_PRETTY', true)
  };
}

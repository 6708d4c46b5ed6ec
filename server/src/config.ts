import os from 'node:os';
import path from 'node:path';
import {
  loadEnvFile,
  readBooleanEnv,
  readEnv,
  readIntegerEnv,
  readPortEnv,
  readListEnv,
  readPathEnv
} from '../../shared/src/env.js';
import {
  BROADCAST_INTERVAL_MS,
  DEFAULT_SERVER_NAME,
  DEFAULT_SERVER_PORT,
  DISCOVERY_PORT
} from '../../shared/src/discovery.js';

export interface ServerConfig {
  host: string;
  port: number;
  serverName: string;
  databasePath: string;
  databaseBusyTimeoutMs: number;
  requestBodyLimitBytes: number;
  corsAllowedOrigins: string[];
  discoveryEnabled: boolean;
  discoveryPort: number;
  discoveryIntervalMs: number;
  sseKeepaliveMs: number;
  sseQueueSize: number;
  clientStaleMs: number;
  clientSweepIntervalMs: number;
  catalogMaxBytes: number;
  catalogUploadMaxPerMinute: number;
  logLevel: string;
  logPretty: boolean;
}

export function loadServerConfig(): ServerConfig {
  loadEnvFile();

  return {
    host: readEnv('HOST', '0.0.0.0') || '0.0.0.0',
    port: readPortEnv('PORT', DEFAULT_SERVER_PORT),
    serverName: readEnv('SERVER_NAME') || DEFAULT_SERVER_NAME,
    databasePath: readPathEnv(
      'DATABASE_PATH',
      path.join(os.homedir(), '.gearledger', 'data', 'gearledger.db')
    ),
    databaseBusyTimeoutMs: readIntegerEnv('DATABASE_BUSY_TIMEOUT_MS', 30_000),
    requestBodyLimitBytes: readIntegerEnv('REQUEST_BODY_LIMIT_BYTES', 1024 * 1024),
    corsAllowedOrigins: readListEnv('CORS_ORIGIN', []),
    discoveryEnabled: readBooleanEnv('DISCOVERY_ENABLED', true),
    discoveryPort: readPortEnv('DISCOVERY_PORT', DISCOVERY_PORT),
    discoveryIntervalMs: readIntegerEnv('DISCOVERY_INTERVAL_MS', BROADCAST_INTERVAL_MS),
    sseKeepaliveMs: readIntegerEnv('SSE_KEEPALIVE_MS', 30_000),
    sseQueueSize: readIntegerEnv('SSE_QUEUE_SIZE', 100),
    clientStaleMs: readIntegerEnv('CLIENT_STALE_MS', 10_000),
    clientSweepIntervalMs: readIntegerEnv('CLIENT_SWEEP_INTERVAL_MS', 2_000),
    catalogMaxBytes: readIntegerEnv('CATALOG_MAX_BYTES', 50 * 1024 * 1024),
    catalogUploadMaxPerMinute: readIntegerEnv('CATALOG_UPLOAD_MAX_PER_MINUTE', 30),
    logLevel: readEnv('LOG_LEVEL') || 'info',
    logPretty: readBooleanEnv('LOG_PRETTY', true)
  };
}

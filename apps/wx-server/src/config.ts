import path from 'path';
import { config as loadEnv } from 'dotenv';
import { redisOptionsFromEnv, RedisStorageOptions } from '@wx/shared';

export interface ServerConfig {
  port: number;
  host: string;
  enableCors: boolean;
  /** Largest accepted batch */
  maxLocations: number;
  /** Directory holding index.html and help.html */
  staticDir: string;
  /** Answer with the historical "application-json" content type */
  legacyContentType: boolean;
  /** Longest time a client may take to send a whole request */
  requestTimeoutMs: number;
  /** Idle time before a keep-alive connection is dropped */
  keepAliveTimeoutMs: number;
  /** How long stop() waits for in-flight requests before dropping their connections */
  shutdownGraceMs: number;
  redis: RedisStorageOptions;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  if (env === process.env) {
    loadEnv();
  }
  return {
    port: Number(env.PORT) || 9990,
    host: env.HOST || '0.0.0.0',
    enableCors: env.ENABLE_CORS !== 'false',
    maxLocations: Number(env.MAX_LOCATIONS) || 16,
    staticDir: env.STATIC_DIR || path.join(__dirname, '..', 'public'),
    legacyContentType: env.LEGACY_CONTENT_TYPE === 'true',
    requestTimeoutMs: Number(env.REQUEST_TIMEOUT_MS) || 15000,
    keepAliveTimeoutMs: Number(env.KEEP_ALIVE_TIMEOUT_MS) || 15000,
    shutdownGraceMs: Number(env.SHUTDOWN_GRACE_MS) || 5000,
    redis: redisOptionsFromEnv(env)
  };
}

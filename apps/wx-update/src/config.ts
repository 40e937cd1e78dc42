import { config as loadEnv } from 'dotenv';
import { redisOptionsFromEnv, RedisStorageOptions } from '@wx/shared';

export interface FeedConfig {
  url: string;
  intervalMs: number;
}

export interface UpdateConfig {
  redis: RedisStorageOptions;
  metar: FeedConfig;
  taf: FeedConfig;
  airports: FeedConfig;
  /** Bound on one feed request, headers and body */
  feedTimeoutMs: number;
}

const AWC_CACHE = 'https://www.aviationweather.gov/adds/dataserver_current/current';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): UpdateConfig {
  if (env === process.env) {
    loadEnv();
  }
  return {
    redis: redisOptionsFromEnv(env),
    metar: {
      url: env.METAR_FEED_URL || `${AWC_CACHE}/metars.cache.csv`,
      intervalMs: Number(env.METAR_INTERVAL_MS) || 60 * 1000
    },
    taf: {
      url: env.TAF_FEED_URL || `${AWC_CACHE}/tafs.cache.csv`,
      intervalMs: Number(env.TAF_INTERVAL_MS) || 60 * 1000
    },
    airports: {
      url: env.AIRPORTS_FEED_URL || 'https://ourairports.com/data/airports.csv',
      intervalMs: Number(env.AIRPORTS_INTERVAL_MS) || 24 * 60 * 60 * 1000
    },
    feedTimeoutMs: Number(env.FEED_TIMEOUT_MS) || 60 * 1000
  };
}

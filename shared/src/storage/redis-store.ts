/**
 * Redis implementation of the storage contract.
 *
 * Key layout:
 *   wx:icao:loc:{CODE}    hash  name, city, country, lat, lon, alt_ft  (no expiry)
 *   wx:icao:metar:{CODE}  string "{type} {raw text}"                   (EX ttl)
 *   wx:icao:taf:{CODE}    string raw text                              (EX ttl)
 */

import { createClient, WatchError } from 'redis';
import type { LocationRecord, ReportKeyspace } from '../models/location.model';
import { StorageError, errorMessage } from '../lib/errors';
import type { CreateResult, StorageEngine } from './storage';

export const KEY_PREFIX_LOCATION = 'wx:icao:loc:';
export const KEY_PREFIX_METAR = 'wx:icao:metar:';
export const KEY_PREFIX_TAF = 'wx:icao:taf:';

const REPORT_PREFIX: Record<ReportKeyspace, string> = {
  metar: KEY_PREFIX_METAR,
  taf: KEY_PREFIX_TAF
};

export type RedisClient = ReturnType<typeof createClient>;

export interface RedisStorageOptions {
  url: string;
  /** Connections kept in the isolated-command pool when idle */
  poolMin: number;
  /** Upper bound of isolated connections checked out at once */
  poolMax: number;
}

export class RedisStorage implements StorageEngine {
  constructor(private client: RedisClient) {}

  async getLocation(code: string): Promise<LocationRecord | null> {
    return this.run('getLocation', async () => {
      const hash = await this.client.hGetAll(KEY_PREFIX_LOCATION + code);
      return parseLocationHash(code, hash);
    });
  }

  async getLocations(codes: readonly string[]): Promise<Array<LocationRecord | null>> {
    return this.run('getLocations', async () => {
      // Commands issued together are pipelined on the shared connection
      const hashes = await Promise.all(codes.map((code) => this.client.hGetAll(KEY_PREFIX_LOCATION + code)));
      return hashes.map((hash, i) => parseLocationHash(codes[i], hash));
    });
  }

  async batchGet(keyspace: ReportKeyspace, codes: readonly string[]): Promise<string[]> {
    if (codes.length === 0) {
      return [];
    }
    return this.run('batchGet', async () => {
      const values = await this.client.mGet(codes.map((code) => REPORT_PREFIX[keyspace] + code));
      return values.map((value) => value ?? '');
    });
  }

  async createLocationIfAbsent(record: LocationRecord): Promise<CreateResult> {
    const key = KEY_PREFIX_LOCATION + record.location;
    return this.run('createLocationIfAbsent', () =>
      // WATCH needs a connection of its own; the pool returns it on every exit path
      this.client.executeIsolated(async (isolated) => {
        await isolated.watch(key);
        if ((await isolated.exists(key)) > 0) {
          await isolated.unwatch();
          return 'unchanged' as const;
        }
        try {
          await isolated
            .multi()
            .hSet(key, {
              name: record.name,
              city: record.city,
              country: record.countryCode,
              lat: String(record.latitude),
              lon: String(record.longitude),
              alt_ft: String(record.altitudeFeet)
            })
            .exec();
        } catch (error) {
          if (error instanceof WatchError) {
            // Created concurrently by another writer
            return 'unchanged' as const;
          }
          // EXEC never ran, so the watch is still set on a pooled connection
          await isolated.unwatch().catch((unwatchError: unknown) => {
            console.error('[REDIS] Unwatch failed:', errorMessage(unwatchError));
          });
          throw error;
        }
        return 'created' as const;
      })
    );
  }

  async upsertWithTTL(keyspace: ReportKeyspace, code: string, value: string, ttlSeconds: number): Promise<void> {
    const key = REPORT_PREFIX[keyspace] + code;
    await this.run('upsertWithTTL', async () => {
      // Redis rejects a non-positive EX, so an already stale report is removed instead
      if (ttlSeconds <= 0) {
        await this.client.del(key);
        return;
      }
      await this.client.set(key, value, { EX: ttlSeconds });
    });
  }

  async exists(code: string): Promise<boolean> {
    return this.run('exists', async () => {
      const count = await this.client.exists([
        KEY_PREFIX_LOCATION + code,
        KEY_PREFIX_METAR + code,
        KEY_PREFIX_TAF + code
      ]);
      return count > 0;
    });
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      console.error('[REDIS] Ping failed:', errorMessage(error));
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new StorageError(`Redis ${operation} failed: ${errorMessage(error)}`, operation);
    }
  }
}

function parseLocationHash(code: string, hash: Record<string, string>): LocationRecord | null {
  if (Object.keys(hash).length === 0) {
    return null;
  }
  const altitudeFeet = Number.parseInt(hash.alt_ft, 10);
  const latitude = Number.parseFloat(hash.lat);
  const longitude = Number.parseFloat(hash.lon);
  if (Number.isNaN(altitudeFeet) || Number.isNaN(latitude) || Number.isNaN(longitude)) {
    throw new Error(`Corrupt location record ${code}`);
  }
  return {
    location: code,
    name: hash.name ?? '',
    city: hash.city ?? '',
    countryCode: hash.country ?? '',
    latitude,
    longitude,
    altitudeFeet
  };
}

/**
 * Connects a Redis client with a bounded isolation pool and wraps it
 */
export async function createRedisStorage(options: RedisStorageOptions): Promise<RedisStorage> {
  const client = createClient({
    url: options.url,
    isolationPoolOptions: {
      min: options.poolMin,
      max: options.poolMax
    }
  });
  client.on('error', (err: unknown) => console.error('[REDIS] Client error:', errorMessage(err)));
  await client.connect();
  console.log(`✅ Redis connected (${options.url})`);
  return new RedisStorage(client);
}

/**
 * Redis connection settings from the environment
 */
export function redisOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RedisStorageOptions {
  return {
    url: env.REDIS_URL || 'redis://localhost:6379',
    poolMin: Number(env.REDIS_POOL_MIN) || 0,
    poolMax: Number(env.REDIS_POOL_MAX) || 50
  };
}

/**
 * Storage contract consumed by the feed ingestors and the API.
 *
 * Three independent keyspaces are keyed by ICAO location code: location
 * metadata (no expiry), METAR and TAF (string values with a TTL). Reads that
 * span keyspaces are not atomic: each keyspace is read on its own, so a
 * response may pair a METAR and a TAF from different refresh cycles.
 */

import type { LocationRecord, ReportKeyspace } from '../models/location.model';

export type CreateResult = 'created' | 'unchanged';

export interface StorageEngine {
  getLocation(code: string): Promise<LocationRecord | null>;

  /** Location records positionally aligned with codes, null where absent */
  getLocations(codes: readonly string[]): Promise<Array<LocationRecord | null>>;

  /** Report values positionally aligned with codes, '' where absent */
  batchGet(keyspace: ReportKeyspace, codes: readonly string[]): Promise<string[]>;

  /** Never overwrites an existing location */
  createLocationIfAbsent(record: LocationRecord): Promise<CreateResult>;

  /** A non-positive TTL expires the value immediately */
  upsertWithTTL(keyspace: ReportKeyspace, code: string, value: string, ttlSeconds: number): Promise<void>;

  /** Whether any keyspace holds the code */
  exists(code: string): Promise<boolean>;

  ping(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * In-process storage with lazily evaluated expiry. Used by tests and local
 * runs without Redis.
 */

import type { LocationRecord, ReportKeyspace } from '../models/location.model';
import type { CreateResult, StorageEngine } from './storage';

interface ReportEntry {
  value: string;
  expiresAt: number;
}

export class MemoryStorage implements StorageEngine {
  private locations: Map<string, LocationRecord> = new Map();
  private reports: Record<ReportKeyspace, Map<string, ReportEntry>> = {
    metar: new Map(),
    taf: new Map()
  };

  constructor(private now: () => number = Date.now) {}

  async getLocation(code: string): Promise<LocationRecord | null> {
    const record = this.locations.get(code);
    return record ? { ...record } : null;
  }

  async getLocations(codes: readonly string[]): Promise<Array<LocationRecord | null>> {
    return Promise.all(codes.map((code) => this.getLocation(code)));
  }

  async batchGet(keyspace: ReportKeyspace, codes: readonly string[]): Promise<string[]> {
    return codes.map((code) => this.readReport(keyspace, code) ?? '');
  }

  async createLocationIfAbsent(record: LocationRecord): Promise<CreateResult> {
    if (this.locations.has(record.location)) {
      return 'unchanged';
    }
    this.locations.set(record.location, { ...record });
    return 'created';
  }

  async upsertWithTTL(keyspace: ReportKeyspace, code: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      this.reports[keyspace].delete(code);
      return;
    }
    this.reports[keyspace].set(code, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async exists(code: string): Promise<boolean> {
    return (
      this.locations.has(code) ||
      this.readReport('metar', code) !== undefined ||
      this.readReport('taf', code) !== undefined
    );
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.locations.clear();
    this.reports.metar.clear();
    this.reports.taf.clear();
  }

  private readReport(keyspace: ReportKeyspace, code: string): string | undefined {
    const entry = this.reports[keyspace].get(code);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.reports[keyspace].delete(code);
      return undefined;
    }
    return entry.value;
  }
}

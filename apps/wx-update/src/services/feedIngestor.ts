/**
 * Shared cycle for all feed ingestors.
 *
 * One run: conditional fetch, header discovery, then rows streamed one at a
 * time into storage. A bad row is skipped; a header, format, transport or
 * storage failure ends the run. Runs never throw, they report.
 */

import {
  CsvColumns,
  CsvReader,
  FeedName,
  FeedRunReport,
  RecordError,
  StorageEngine,
  TimestampParseError,
  errorMessage,
  expireSeconds,
  isValidIcaoLocation,
  resolveCsvColumns
} from '@wx/shared';
import type { FeedClient } from './feedClient';

export interface IngestorOptions {
  url: string;
  storage: StorageEngine;
  feedClient: FeedClient;
  now?: () => Date;
}

export type RowOutcome = 'stored' | 'unchanged';

export interface FeedRunner {
  readonly feed: FeedName;
  readonly lastUpdatedAt: Date;
  run(): Promise<FeedRunReport>;
}

export abstract class FeedIngestor<F extends string> implements FeedRunner {
  abstract readonly feed: FeedName;
  protected abstract readonly fields: readonly F[];
  /** Whether every row must be as wide as the header */
  protected readonly strictWidth: boolean = true;

  protected readonly url: string;
  protected readonly storage: StorageEngine;
  protected readonly now: () => Date;
  private readonly feedClient: FeedClient;
  private lastUpdated = new Date(0);

  constructor(options: IngestorOptions) {
    this.url = options.url;
    this.storage = options.storage;
    this.feedClient = options.feedClient;
    this.now = options.now ?? (() => new Date());
  }

  /** Time of the last successful fetch; epoch until the first one */
  get lastUpdatedAt(): Date {
    return this.lastUpdated;
  }

  async run(): Promise<FeedRunReport> {
    const started = Date.now();
    const report: FeedRunReport = {
      feed: this.feed,
      status: 'failed',
      stored: 0,
      skipped: 0,
      filtered: 0,
      unchanged: 0,
      durationMs: 0
    };

    try {
      const result = await this.feedClient.fetchIfModified(this.url, this.lastUpdated);
      if (result.status === 'not-modified') {
        report.status = 'not-modified';
      } else {
        this.lastUpdated = result.fetchedAt;
        console.log(`[${this.tag}] Updating from ${this.url}`);
        try {
          await this.ingest(CsvReader.fromStream(result.body), report);
        } finally {
          result.body.destroy();
        }
        report.status = 'updated';
      }
    } catch (error) {
      report.status = 'failed';
      report.error = errorMessage(error);
      console.error(`[${this.tag}] ❌ Update failed:`, report.error);
    }

    report.durationMs = Date.now() - started;
    this.logReport(report);
    return report;
  }

  protected abstract ingestRecord(record: readonly string[], columns: CsvColumns<F>): Promise<RowOutcome>;

  /** Validated ICAO code from a station or gps code column */
  protected locationCode(value: string, normalize: boolean): string {
    const code = normalize ? value.trim().toUpperCase() : value;
    if (!isValidIcaoLocation(code)) {
      throw new RecordError(`Invalid ICAO location code "${value}"`, 'filtered');
    }
    return code;
  }

  protected ttlFrom(timestamp: string, windowSeconds: number): number {
    try {
      return expireSeconds(timestamp, windowSeconds, this.now());
    } catch (error) {
      if (error instanceof TimestampParseError) {
        throw new RecordError(error.message);
      }
      throw error;
    }
  }

  private get tag(): string {
    return this.feed.toUpperCase();
  }

  private async ingest(reader: CsvReader, report: FeedRunReport): Promise<void> {
    const columns = await resolveCsvColumns(reader, this.fields);
    if (!this.strictWidth) {
      reader.fieldsPerRecord = -1;
    }

    for await (const record of reader.records()) {
      let outcome: RowOutcome;
      try {
        outcome = await this.ingestRecord(record, columns);
      } catch (error) {
        if (!(error instanceof RecordError)) {
          throw error;
        }
        if (error.reason === 'filtered') {
          report.filtered++;
        } else {
          report.skipped++;
          console.warn(`[${this.tag}] Skipping line ${reader.line}: ${error.message}`);
        }
        continue;
      }
      if (outcome === 'stored') {
        report.stored++;
      } else {
        report.unchanged++;
      }
    }
  }

  private logReport(report: FeedRunReport) {
    if (report.status === 'not-modified') {
      console.log(`[${this.tag}] Not modified since ${this.lastUpdated.toISOString()}`);
      return;
    }
    const counts = `${report.stored} stored, ${report.unchanged} unchanged, ${report.skipped} skipped, ${report.filtered} filtered`;
    const icon = report.status === 'updated' ? '✅' : '⚠️';
    console.log(`[${this.tag}] ${icon} ${report.status} in ${report.durationMs}ms: ${counts}`);
  }
}

import type { CsvColumns } from '@wx/shared';
import { FeedIngestor, RowOutcome } from './feedIngestor';

export const TAF_FIELDS = ['raw_text', 'station_id', 'valid_time_to'] as const;
type TafField = (typeof TAF_FIELDS)[number];

export class TafIngestor extends FeedIngestor<TafField> {
  readonly feed = 'taf';
  protected readonly fields = TAF_FIELDS;
  // Forecast rows carry a variable number of trailing group columns
  protected readonly strictWidth = false;

  protected async ingestRecord(record: readonly string[], columns: CsvColumns<TafField>): Promise<RowOutcome> {
    const station = this.locationCode(columns.get(record, 'station_id'), true);
    // A forecast expires when its validity period ends
    const ttl = this.ttlFrom(columns.get(record, 'valid_time_to'), 0);
    await this.storage.upsertWithTTL('taf', station, columns.get(record, 'raw_text'), ttl);
    return 'stored';
  }
}

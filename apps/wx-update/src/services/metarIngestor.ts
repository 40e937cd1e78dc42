import type { CsvColumns } from '@wx/shared';
import { FeedIngestor, RowOutcome } from './feedIngestor';

export const METAR_FIELDS = ['raw_text', 'station_id', 'observation_time', 'metar_type'] as const;
type MetarField = (typeof METAR_FIELDS)[number];

/** Observations are kept for three hours after they were made */
export const METAR_TTL_WINDOW_SECONDS = 3 * 60 * 60;

export class MetarIngestor extends FeedIngestor<MetarField> {
  readonly feed = 'metar';
  protected readonly fields = METAR_FIELDS;

  protected async ingestRecord(record: readonly string[], columns: CsvColumns<MetarField>): Promise<RowOutcome> {
    const station = this.locationCode(columns.get(record, 'station_id'), true);
    const ttl = this.ttlFrom(columns.get(record, 'observation_time'), METAR_TTL_WINDOW_SECONDS);
    const report = `${columns.get(record, 'metar_type')} ${columns.get(record, 'raw_text')}`;
    await this.storage.upsertWithTTL('metar', station, report, ttl);
    return 'stored';
  }
}

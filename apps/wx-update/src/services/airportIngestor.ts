import { CsvColumns, LocationRecord, RecordError } from '@wx/shared';
import { FeedIngestor, RowOutcome } from './feedIngestor';

export const AIRPORT_FIELDS = [
  'type',
  'name',
  'latitude_deg',
  'longitude_deg',
  'elevation_ft',
  'iso_country',
  'iso_region',
  'municipality',
  'gps_code'
] as const;
type AirportField = (typeof AIRPORT_FIELDS)[number];

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Location metadata from the airports directory. Records are created once
 * and never overwritten.
 */
export class AirportIngestor extends FeedIngestor<AirportField> {
  readonly feed = 'airports';
  protected readonly fields = AIRPORT_FIELDS;

  protected async ingestRecord(record: readonly string[], columns: CsvColumns<AirportField>): Promise<RowOutcome> {
    if (columns.get(record, 'type') === 'closed') {
      throw new RecordError('Airport is closed', 'filtered');
    }
    const location = this.locationCode(columns.get(record, 'gps_code'), false);

    const airport: LocationRecord = {
      location,
      name: columns.get(record, 'name'),
      city: columns.get(record, 'municipality'),
      countryCode: columns.get(record, 'iso_country'),
      latitude: parseNumber(
        columns.get(record, 'latitude_deg'),
        DECIMAL,
        Number.isFinite,
        'latitude_deg',
        location
      ),
      longitude: parseNumber(
        columns.get(record, 'longitude_deg'),
        DECIMAL,
        Number.isFinite,
        'longitude_deg',
        location
      ),
      altitudeFeet: parseNumber(
        columns.get(record, 'elevation_ft'),
        INTEGER,
        Number.isSafeInteger,
        'elevation_ft',
        location
      )
    };

    const result = await this.storage.createLocationIfAbsent(airport);
    return result === 'created' ? 'stored' : 'unchanged';
  }
}

// The pattern alone lets through 1e400 (Infinity) and integers past 2^53
function parseNumber(
  value: string,
  pattern: RegExp,
  representable: (parsed: number) => boolean,
  field: string,
  location: string
): number {
  const parsed = pattern.test(value) ? Number(value) : NaN;
  if (!representable(parsed)) {
    throw new RecordError(`Cannot parse ${field} "${value}" for ${location}`);
  }
  return parsed;
}

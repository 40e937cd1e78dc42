/**
 * Records kept per ICAO location
 */

/** Keyspaces holding raw report text with a TTL */
export type ReportKeyspace = 'metar' | 'taf';

/**
 * Static airport metadata. Written once by the airport feed and never
 * overwritten afterwards.
 */
export interface LocationRecord {
  location: string;
  name: string;
  city: string;
  countryCode: string;
  latitude: number;
  longitude: number;
  altitudeFeet: number;
}

/**
 * Merged view of one location as served by the API. Fields left undefined
 * are omitted from the response.
 */
export interface AggregatedView {
  location: string;
  metar?: string;
  taf?: string;
  name?: string;
  city?: string;
  countryCode?: string;
  latitude?: number;
  longitude?: number;
  altitudeMeters?: number;
  altitudeFeet?: number;
}

export function feetToMeters(feet: number): number {
  return Math.trunc((feet * 3048) / 10000);
}

/**
 * Builds the served view from a stored location record.
 */
export function toAggregatedView(record: LocationRecord): AggregatedView {
  return {
    location: record.location,
    name: record.name,
    city: record.city,
    countryCode: record.countryCode,
    latitude: record.latitude,
    longitude: record.longitude,
    altitudeMeters: feetToMeters(record.altitudeFeet),
    altitudeFeet: record.altitudeFeet
  };
}

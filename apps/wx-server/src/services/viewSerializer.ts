import type { AggregatedView } from '@wx/shared';

type ViewField = keyof AggregatedView;

// Field order and wire names of a served view
const WIRE_FIELDS: ReadonlyArray<[ViewField, string]> = [
  ['location', 'location'],
  ['metar', 'metar'],
  ['taf', 'taf'],
  ['name', 'name'],
  ['city', 'city'],
  ['countryCode', 'country_code'],
  ['latitude', 'latitude'],
  ['longitude', 'longitude'],
  ['altitudeMeters', 'altitude_meters'],
  ['altitudeFeet', 'altitude_feet']
];

export type WireView = Record<string, string | number>;

/**
 * Drops empty fields: undefined, '' and 0
 */
export function toWireView(view: AggregatedView): WireView {
  const wire: WireView = {};
  for (const [field, name] of WIRE_FIELDS) {
    const value = view[field];
    if (value === undefined || value === '' || value === 0) {
      continue;
    }
    wire[name] = value;
  }
  return wire;
}

/** Two-space indented JSON with a trailing newline */
export function formatJson(body: WireView | WireView[]): string {
  return `${JSON.stringify(body, null, 2)}\n`;
}

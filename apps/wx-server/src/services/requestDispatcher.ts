/**
 * Turns a request path and raw query string into an endpoint and location
 * selector. Paths are `/{endpoint}` or `/{endpoint}/{CODE}`; batches come
 * from repeatable `location=A,B` query parameters.
 */

import { ErrorCodes, RequestError, validateIcaoLocation, validateIcaoLocations } from '@wx/shared';

export const ENDPOINTS = ['metar', 'taf', 'location', 'all'] as const;
export type Endpoint = (typeof ENDPOINTS)[number];

export const MAX_LOCATIONS = 16;

export interface ParsedPath {
  endpoint: string;
  /** Upper-cased code from the second segment, '' when absent */
  location: string;
}

export type DispatchedRequest =
  | { kind: 'single'; endpoint: Endpoint; location: string }
  | { kind: 'batch'; endpoint: Endpoint; locations: string[] };

export function isEndpoint(value: string): value is Endpoint {
  return ENDPOINTS.some((endpoint) => endpoint === value);
}

function badRequest(message: string): RequestError {
  return new RequestError(message, 400, ErrorCodes.BAD_REQUEST);
}

function unprocessable(message: string): RequestError {
  return new RequestError(message, 422, ErrorCodes.VALIDATION_ERROR);
}

function decode(component: string, source: string): string {
  try {
    return decodeURIComponent(component);
  } catch {
    throw badRequest(`Malformed percent-encoding in ${source}`);
  }
}

export function parsePath(path: string): ParsedPath {
  // The leading segment is always empty; one trailing slash is allowed
  const segments = path.split('/').slice(1);
  if (segments.length > 0 && segments[segments.length - 1] === '') {
    segments.pop();
  }
  switch (segments.length) {
    case 1:
      return { endpoint: decode(segments[0], path), location: '' };
    case 2:
      return { endpoint: decode(segments[0], path), location: decode(segments[1], path).toUpperCase() };
    default:
      throw badRequest(`Unable to parse URL path ${path}`);
  }
}

/**
 * Location codes from the query, upper-cased, in order of appearance
 */
export function parseQuery(rawQuery: string): string[] {
  const locations: string[] = [];
  for (const pair of rawQuery.split('&')) {
    if (pair === '') {
      continue;
    }
    const eq = pair.indexOf('=');
    const key = decode((eq < 0 ? pair : pair.slice(0, eq)).replace(/\+/g, ' '), rawQuery);
    const value = eq < 0 ? '' : decode(pair.slice(eq + 1).replace(/\+/g, ' '), rawQuery);
    if (key !== 'location') {
      throw badRequest(`Unknown parameter ${key} in URL query ${rawQuery}`);
    }
    locations.push(...value.split(',').map((code) => code.toUpperCase()));
  }
  return locations;
}

export function dispatch(path: string, rawQuery: string, maxLocations: number = MAX_LOCATIONS): DispatchedRequest {
  const { endpoint, location } = parsePath(path);
  const locations = parseQuery(rawQuery);

  if (location && locations.length > 0) {
    throw unprocessable(
      `Single location ${location} and multiple locations ${locations.join(',')} must not be specified in the same request`
    );
  }
  if (!location && locations.length === 0) {
    throw unprocessable('Location not specified');
  }
  if (!isEndpoint(endpoint)) {
    throw unprocessable(`Unknown endpoint ${endpoint}`);
  }

  if (location) {
    validateIcaoLocation(location);
    return { kind: 'single', endpoint, location };
  }
  if (locations.length > maxLocations) {
    throw new RequestError(
      `${locations.length} locations specified while maximum of ${maxLocations} is allowed`,
      403,
      ErrorCodes.FORBIDDEN
    );
  }
  validateIcaoLocations(locations);
  return { kind: 'batch', endpoint, locations };
}

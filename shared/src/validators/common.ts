/**
 * Validators shared by the API and the feed ingestors
 */

export class ValidationError extends Error {
  constructor(message: string, public field: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

const ICAO_LOCATION_REGEX = /^[A-Z][A-Z0-9]{3}$/;

/**
 * Checks the ICAO location code shape: four characters, an uppercase letter
 * followed by three uppercase letters or digits.
 */
export function isValidIcaoLocation(code: string): boolean {
  return ICAO_LOCATION_REGEX.test(code);
}

/**
 * Validate ICAO location code
 * Raises ValidationError for codes not matching [A-Z][A-Z0-9]{3}
 */
export function validateIcaoLocation(code: string): void {
  if (!code) {
    throw new ValidationError('Location is required', 'location');
  }
  if (!isValidIcaoLocation(code)) {
    throw new ValidationError(`Invalid ICAO location code format ${code}`, 'location');
  }
}

/**
 * Validates every code of a batch. The first invalid code rejects the batch.
 */
export function validateIcaoLocations(codes: readonly string[]): void {
  codes.forEach(validateIcaoLocation);
}

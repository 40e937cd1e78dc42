/**
 * Error taxonomy shared by the API and the ingestion worker
 */

import { ErrorCodes } from '../contracts/common';

/**
 * A request that can be answered with a client error status
 */
export class RequestError extends Error {
  constructor(message: string, public status: number, public code: ErrorCodes) {
    super(message);
    this.name = 'RequestError';
  }
}

export class NotFoundError extends RequestError {
  constructor(message: string) {
    super(message, 404, ErrorCodes.NOT_FOUND);
    this.name = 'NotFoundError';
  }
}

/**
 * Header row missing or lacking required columns. Aborts an ingestion cycle.
 */
export class CsvHeaderError extends Error {
  constructor(
    message: string,
    public indices: number[] = [],
    public missing: string[] = []
  ) {
    super(message);
    this.name = 'CsvHeaderError';
  }
}

/**
 * Malformed CSV content, e.g. a record of the wrong width
 */
export class CsvFormatError extends Error {
  constructor(message: string, public line: number) {
    super(`${message} (line ${line})`);
    this.name = 'CsvFormatError';
  }
}

export class TimestampParseError extends Error {
  constructor(public value: string) {
    super(`Cannot parse timestamp "${value}"`);
    this.name = 'TimestampParseError';
  }
}

/**
 * Why a feed row was not stored:
 * malformed - a value could not be parsed
 * filtered - the row is deliberately excluded (closed airport, no ICAO code)
 */
export type SkipReason = 'malformed' | 'filtered';

/**
 * A single feed row that cannot be stored. Only that row is skipped.
 */
export class RecordError extends Error {
  constructor(message: string, public reason: SkipReason = 'malformed') {
    super(message);
    this.name = 'RecordError';
  }
}

export class FeedTransportError extends Error {
  constructor(message: string, public url: string) {
    super(message);
    this.name = 'FeedTransportError';
  }
}

export class StorageError extends Error {
  constructor(message: string, public operation: string) {
    super(message);
    this.name = 'StorageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

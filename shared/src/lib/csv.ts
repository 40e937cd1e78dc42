/**
 * Streaming CSV reader and header discovery for loosely formatted feeds.
 *
 * Feeds published as CSV may start with one or more info/diagnostic lines
 * before the row of column names, and the column order is not stable between
 * publications. The header is located heuristically: the first record with
 * more than one field is taken as the column names. This is best effort, not
 * a general dialect detector.
 */

import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { CsvFormatError, CsvHeaderError, RecordError } from './errors';

export class CsvReader {
  /**
   * Expected number of fields per record.
   * > 0: every record must have exactly this many fields
   * 0: adopt the width of the next record read
   * < 0: width is not checked
   */
  public fieldsPerRecord = 0;

  private lines: AsyncIterator<string>;
  private lineNumber = 0;
  private recordStart = 0;

  constructor(source: AsyncIterable<string>) {
    this.lines = source[Symbol.asyncIterator]();
  }

  static fromStream(stream: Readable): CsvReader {
    return new CsvReader(createInterface({ input: stream, crlfDelay: Infinity }));
  }

  static fromString(text: string): CsvReader {
    return new CsvReader(splitLines(text));
  }

  /** Line number of the last line consumed, 1-based */
  get line(): number {
    return this.lineNumber;
  }

  /**
   * Reads the next record, or null at the end of the stream.
   */
  async read(): Promise<string[] | null> {
    const record = await this.readRecord();
    if (record === null) {
      return null;
    }
    if (this.fieldsPerRecord === 0) {
      this.fieldsPerRecord = record.length;
    } else if (this.fieldsPerRecord > 0 && record.length !== this.fieldsPerRecord) {
      throw new CsvFormatError(
        `Wrong number of fields: expected ${this.fieldsPerRecord}, got ${record.length}`,
        this.recordStart
      );
    }
    return record;
  }

  async *records(): AsyncGenerator<string[]> {
    for (;;) {
      const record = await this.read();
      if (record === null) {
        return;
      }
      yield record;
    }
  }

  private async nextLine(): Promise<string | null> {
    const next = await this.lines.next();
    if (next.done) {
      return null;
    }
    this.lineNumber++;
    return next.value;
  }

  private async readRecord(): Promise<string[] | null> {
    let line = await this.nextLine();
    while (line === '') {
      line = await this.nextLine();
    }
    if (line === null) {
      return null;
    }

    this.recordStart = this.lineNumber;
    const fields: string[] = [];
    let field = '';
    let inQuotes = false;

    for (;;) {
      for (let i = 0; i < line.length; i++) {
        const c = line[i];
        if (inQuotes) {
          if (c === '"') {
            if (line[i + 1] === '"') {
              field += '"';
              i++;
            } else {
              inQuotes = false;
            }
          } else {
            field += c;
          }
        } else if (c === '"' && field === '') {
          inQuotes = true;
        } else if (c === ',') {
          fields.push(field);
          field = '';
        } else {
          field += c;
        }
      }
      if (!inQuotes) {
        break;
      }
      // Quoted field continues on the next line
      const next = await this.nextLine();
      if (next === null) {
        throw new CsvFormatError('Unterminated quoted field', this.recordStart);
      }
      field += '\n';
      line = next;
    }

    fields.push(field);
    return fields;
  }
}

async function* splitLines(text: string): AsyncGenerator<string> {
  for (const line of text.split(/\r?\n/)) {
    yield line;
  }
}

/**
 * Skips leading single-field records, takes the first record with more than
 * one field as the header and returns the zero-based column index of each
 * requested name (first occurrence wins). Fixes the reader's expected width
 * to the header width.
 *
 * Throws CsvHeaderError when no names are given, when the stream ends before
 * a header, or when any name is absent; in the last case the error still
 * carries every index, with -1 for the missing names.
 */
export async function resolveCsvHeader(
  reader: CsvReader,
  fieldNames: readonly string[]
): Promise<number[]> {
  if (fieldNames.length < 1) {
    throw new CsvHeaderError('No field names specified');
  }
  const indices = fieldNames.map(() => -1);

  reader.fieldsPerRecord = -1;
  for (;;) {
    const record = await reader.read();
    if (record === null) {
      throw new CsvHeaderError('Stream ended before the CSV header', indices, [...fieldNames]);
    }
    if (record.length > 1) {
      reader.fieldsPerRecord = record.length;
      record.forEach((name, column) => {
        fieldNames.forEach((fieldName, j) => {
          if (name === fieldName && indices[j] === -1) {
            indices[j] = column;
          }
        });
      });
      break;
    }
  }

  const missing = fieldNames.filter((_, j) => indices[j] < 0);
  if (missing.length > 0) {
    throw new CsvHeaderError(`Fields not found in CSV header: ${missing.join(', ')}`, indices, missing);
  }
  return indices;
}

/**
 * Named access to the columns resolved from a header row
 */
export class CsvColumns<F extends string> {
  private readonly index = new Map<F, number>();

  constructor(fields: readonly F[], indices: readonly number[]) {
    fields.forEach((field, i) => this.index.set(field, indices[i]));
  }

  get(record: readonly string[], field: F): string {
    const column = this.index.get(field);
    if (column === undefined || column < 0) {
      throw new RecordError(`Column ${field} is not resolved`);
    }
    const value = record[column];
    if (value === undefined) {
      throw new RecordError(`Record has ${record.length} fields, no column ${field}`);
    }
    return value;
  }
}

export async function resolveCsvColumns<F extends string>(
  reader: CsvReader,
  fields: readonly F[]
): Promise<CsvColumns<F>> {
  const indices = await resolveCsvHeader(reader, fields);
  return new CsvColumns(fields, indices);
}

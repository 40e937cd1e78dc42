export type FeedName = 'metar' | 'taf' | 'airports';

export type FeedRunStatus = 'updated' | 'not-modified' | 'failed';

/**
 * Outcome of one ingestion cycle of a feed
 */
export interface FeedRunReport {
  feed: FeedName;
  status: FeedRunStatus;
  stored: number;
  // Rows with values that could not be parsed
  skipped: number;
  // Rows excluded on purpose, e.g. closed airports
  filtered: number;
  // Airport rows whose location already existed
  unchanged: number;
  durationMs: number;
  error?: string;
}

// Models and contracts
export type { LocationRecord, AggregatedView, ReportKeyspace } from './models/location.model';
export { feetToMeters, toAggregatedView } from './models/location.model';
export type { FeedName, FeedRunStatus, FeedRunReport } from './models/feed.model';
export type { ApiResponse, HealthCheck } from './contracts/common';
export { ErrorCodes, generateTraceId } from './contracts/common';

// Validation and errors
export { ValidationError, isValidIcaoLocation, validateIcaoLocation, validateIcaoLocations } from './validators/common';
export type { SkipReason } from './lib/errors';
export {
  RequestError,
  NotFoundError,
  CsvHeaderError,
  CsvFormatError,
  TimestampParseError,
  RecordError,
  FeedTransportError,
  StorageError,
  errorMessage
} from './lib/errors';

// Feed processing
export { CsvReader, CsvColumns, resolveCsvHeader, resolveCsvColumns } from './lib/csv';
export { expireSeconds, parseRfc3339 } from './lib/ttl';
export type { ScheduleHandle } from './lib/schedule';
export { schedule } from './lib/schedule';

// Storage
export type { StorageEngine, CreateResult } from './storage/storage';
export { MemoryStorage } from './storage/memory-store';
export type { RedisClient, RedisStorageOptions } from './storage/redis-store';
export { RedisStorage, createRedisStorage, redisOptionsFromEnv, KEY_PREFIX_LOCATION, KEY_PREFIX_METAR, KEY_PREFIX_TAF } from './storage/redis-store';

// Main entry point
export { DatasetLoader, getDataset } from './DatasetLoader.js';
export type { DatasetLoaderConfig } from './DatasetLoader.js';

// Dataset constructors
export { fromDelimited, fromDelimitedHeadered, fromStructuredDocument } from './application/datasets/constructors.js';
export type { HeaderedDatasetOptions } from './application/datasets/constructors.js';
export { FetchedDataset } from './application/datasets/FetchedDataset.js';
export type { DatasetOptions } from './application/datasets/FetchedDataset.js';

// Domain model
export type { Source, UrlSource } from './domain/model/Source.js';
export { urlSource, sourceIdentifier } from './domain/model/Source.js';
export type { DecodeIssue, DecodeResult } from './domain/model/DecodeResult.js';
export { decoded, decodeFailed, formatIssues } from './domain/model/DecodeResult.js';

// Errors
export {
  DatasetError,
  FetchError,
  IOError,
  ParseError,
  FieldDecodeError,
  isDatasetError,
} from './domain/errors/DatasetError.js';
export type { DatasetErrorCode } from './domain/errors/DatasetError.js';

// Preprocessing and field helpers
export {
  dropLines,
  fixAmericanDecimals,
  fixedWidthToCSV,
  composePreprocessors,
} from './domain/services/TextPreprocessing.js';
export {
  dashesToCamelCase,
  readField,
  readFieldAfterDashToCamel,
  intReader,
  numberReader,
  booleanReader,
  enumReader,
} from './domain/services/FieldReaders.js';
export type { FieldReader } from './domain/services/FieldReaders.js';
export { fractionalYearToDate } from './domain/services/fractionalYear.js';

// Application internals
export { EventBus } from './application/EventBus.js';
export { CachingSourceResolver } from './application/CachingSourceResolver.js';
export type { CachingSourceResolverOptions } from './application/CachingSourceResolver.js';

// Ports (for custom implementations)
export type { Dataset } from './domain/ports/Dataset.js';
export type { CacheStore } from './domain/ports/CacheStore.js';
export type { HttpClient } from './domain/ports/HttpClient.js';
export type { SourceResolver } from './domain/ports/SourceResolver.js';
export type { FormatParser, ParseResult, Preprocessor } from './domain/ports/FormatParser.js';
export type { RecordDecoder, PositionalRow, NamedRow } from './domain/ports/RecordDecoder.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  CacheHitEvent,
  CacheMissEvent,
  SourceFetchedEvent,
  DatasetLoadingEvent,
  DatasetLoadedEvent,
  DatasetFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export {
  FileCacheStore,
  resolveCachePath,
  cacheKey,
  defaultCacheDirectory,
  CACHE_KEY_ALGORITHM,
  DEFAULT_CACHE_SUBDIRECTORY,
} from './infrastructure/cache/FileCacheStore.js';
export type { FileCacheStoreOptions } from './infrastructure/cache/FileCacheStore.js';
export { FetchHttpClient } from './infrastructure/http/FetchHttpClient.js';
export type { FetchHttpClientOptions } from './infrastructure/http/FetchHttpClient.js';
export { CsvParser, HeaderedCsvParser } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions } from './infrastructure/parsers/CsvParser.js';
export { JsonParser } from './infrastructure/parsers/JsonParser.js';
export { ZodRecordDecoder, zodDecoder } from './infrastructure/decoders/ZodRecordDecoder.js';
export { fieldSchema, dashedFieldSchema } from './infrastructure/decoders/fieldSchemas.js';

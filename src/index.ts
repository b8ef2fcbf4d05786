// Main entry point
export { OpenDataTap } from './OpenDataTap.js';
export type { OpenDataTapConfig } from './OpenDataTap.js';

// Configuration
export { parseTapConfig, loadTapConfig, TapConfigSchema } from './config/TapConfig.js';
export type { TapConfig } from './config/TapConfig.js';

// Domain model
export type { Distribution, DistributionSet } from './domain/model/Distribution.js';
export { classifyDistributions } from './domain/model/Distribution.js';
export type { DatasetDescriptor, DatasetDescriptorInput } from './domain/model/DatasetDescriptor.js';
export { createDatasetDescriptor } from './domain/model/DatasetDescriptor.js';
export type { ColumnDefinition } from './domain/model/ColumnDefinition.js';
export { ColumnDatatype, resolveDatatype } from './domain/model/ColumnDefinition.js';
export type { DocumentSchema, SchemaIssue, SchemaIssueCode } from './domain/model/DocumentSchema.js';
export { createDocumentSchema, hasIssues } from './domain/model/DocumentSchema.js';
export type { DatasetRecord, RecordValue, RawRow } from './domain/model/Record.js';
export type { CsvDialect } from './domain/model/CsvDialect.js';
export type { UnresolvedStream, ResolvedStream } from './domain/model/StreamHandle.js';
export { unresolvedStream } from './domain/model/StreamHandle.js';

// Domain services
export { slugify } from './domain/services/slugify.js';
export { castValue, castDate, castNumber, formatDate } from './domain/services/ValueCaster.js';
export type { CastResult } from './domain/services/ValueCaster.js';
export { RecordBuilder } from './domain/services/RecordBuilder.js';
export { toJsonSchema, toJsonSchemaProperty } from './domain/services/JsonSchemaBuilder.js';
export type { JsonSchemaObject, JsonSchemaProperty } from './domain/services/JsonSchemaBuilder.js';

// Errors
export {
  CatalogError,
  MetadataNotFoundError,
  MetadataServiceError,
  MalformedMetadataError,
  SchemaUnavailableError,
  MalformedSchemaError,
  PayloadUnavailableError,
  UnsupportedContentTypeError,
  DialectDetectionError,
  RowCastError,
  ConfigurationError,
} from './domain/errors/CatalogErrors.js';
export type { CatalogErrorCode } from './domain/errors/CatalogErrors.js';

// Ports (for custom implementations)
export type { MetadataResolver } from './domain/ports/MetadataResolver.js';
export type { SchemaFetcher } from './domain/ports/SchemaFetcher.js';
export type { RecordStreamer, RowErrorPolicy } from './domain/ports/RecordStreamer.js';
export type {
  MessageWriter,
  TapMessage,
  SchemaMessage,
  RecordMessage,
  StateMessage,
} from './domain/ports/MessageWriter.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  DatasetResolvedEvent,
  SchemaResolvedEvent,
  SchemaIssueEvent,
  DialectDetectedEvent,
  RowSkippedEvent,
  StreamCompletedEvent,
  StreamFailedEvent,
} from './domain/events/DomainEvents.js';

// Application
export { EventBus } from './application/EventBus.js';
export { StreamFactory } from './application/StreamFactory.js';
export type { StreamFactoryDeps } from './application/StreamFactory.js';
export type { Catalog, CatalogEntry } from './application/usecases/DiscoverCatalog.js';
export type { SyncSummary, StreamSummary } from './application/usecases/SyncStreams.js';

// Infrastructure adapters (built-in)
export {
  GraphQLMetadataResolver,
  DEFAULT_METADATA_ENDPOINT,
  DEFAULT_LOCALE,
} from './infrastructure/metadata/GraphQLMetadataResolver.js';
export type { GraphQLMetadataResolverOptions } from './infrastructure/metadata/GraphQLMetadataResolver.js';
export { HttpSchemaFetcher } from './infrastructure/schema/HttpSchemaFetcher.js';
export type { HttpSchemaFetcherOptions } from './infrastructure/schema/HttpSchemaFetcher.js';
export { CsvRecordStreamer } from './infrastructure/records/CsvRecordStreamer.js';
export type { CsvRecordStreamerOptions } from './infrastructure/records/CsvRecordStreamer.js';
export { CsvParser, CSV_SNIFF_SAMPLE_SIZE, CSV_CONSISTENCY_THRESHOLD } from './infrastructure/parsers/CsvParser.js';
export type { CsvEntry, CsvHeader, CsvRow, DetectOptions } from './infrastructure/parsers/CsvParser.js';
export { UrlSource } from './infrastructure/sources/UrlSource.js';
export type { UrlSourceOptions, CsvPayload } from './infrastructure/sources/UrlSource.js';
export { TempFileBuffer } from './infrastructure/buffers/TempFileBuffer.js';
export { parseContentType } from './infrastructure/http/contentType.js';
export type { MediaType } from './infrastructure/http/contentType.js';
export type { HttpOptions } from './infrastructure/http/fetchWithTimeout.js';
export { JsonLinesWriter } from './infrastructure/output/JsonLinesWriter.js';
export type { TextSink } from './infrastructure/output/JsonLinesWriter.js';
export { InMemoryMessageWriter } from './infrastructure/output/InMemoryMessageWriter.js';
export { createLogger } from './infrastructure/logging/logger.js';

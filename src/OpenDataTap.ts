import type { Logger } from 'pino';
import type { TapConfig } from './config/TapConfig.js';
import type { MetadataResolver } from './domain/ports/MetadataResolver.js';
import type { SchemaFetcher } from './domain/ports/SchemaFetcher.js';
import type { RecordStreamer } from './domain/ports/RecordStreamer.js';
import type { MessageWriter } from './domain/ports/MessageWriter.js';
import type { ResolvedStream } from './domain/model/StreamHandle.js';
import type { EventType, EventPayload } from './domain/events/DomainEvents.js';
import type { TapContext } from './application/TapContext.js';
import type { Catalog } from './application/usecases/DiscoverCatalog.js';
import type { SyncSummary } from './application/usecases/SyncStreams.js';
import { EventBus } from './application/EventBus.js';
import { StreamFactory } from './application/StreamFactory.js';
import { DiscoverCatalog } from './application/usecases/DiscoverCatalog.js';
import { SyncStreams } from './application/usecases/SyncStreams.js';
import { GraphQLMetadataResolver } from './infrastructure/metadata/GraphQLMetadataResolver.js';
import { HttpSchemaFetcher } from './infrastructure/schema/HttpSchemaFetcher.js';
import { CsvRecordStreamer } from './infrastructure/records/CsvRecordStreamer.js';
import { createChildLogger } from './infrastructure/logging/logger.js';
import { ConfigurationError } from './domain/errors/CatalogErrors.js';

export interface OpenDataTapConfig extends TapConfig {
  /** Replaces the GraphQL resolver built from `endpoint`, `locale` and `validateQuery`. */
  readonly resolver?: MetadataResolver;
  readonly schemaFetcher?: SchemaFetcher;
  /** Replaces the CSV streamer built from `rowErrorPolicy`. */
  readonly streamer?: RecordStreamer;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

/**
 * Entry point: discovers and syncs one stream per configured dataset identifier.
 *
 * ```ts
 * const tap = new OpenDataTap({ identifiers: ['https://data.gov.cz/zdroj/datové-sady/...'] });
 * tap.on('stream:completed', (e) => console.error(e.stream, e.recordCount));
 * await tap.sync(new JsonLinesWriter());
 * ```
 */
export class OpenDataTap {
  private readonly eventBus: EventBus;
  private readonly factory: StreamFactory;
  private readonly ctx: TapContext;

  constructor(config: OpenDataTapConfig) {
    if (config.identifiers.length === 0) {
      throw new ConfigurationError('OpenDataTap: at least one dataset identifier is required');
    }

    const logger = config.logger ?? createChildLogger({ component: 'OpenDataTap' });
    const componentLogger = (component: string): Logger => logger.child({ component });
    this.eventBus = new EventBus(componentLogger('EventBus'));

    const http = { timeout: config.timeoutMs };
    this.factory = new StreamFactory({
      resolver:
        config.resolver ??
        new GraphQLMetadataResolver({
          ...http,
          endpoint: config.endpoint,
          locale: config.locale,
          validateQuery: config.validateQuery,
          logger: componentLogger('GraphQLMetadataResolver'),
        }),
      schemaFetcher:
        config.schemaFetcher ?? new HttpSchemaFetcher({ ...http, logger: componentLogger('HttpSchemaFetcher') }),
      streamer:
        config.streamer ??
        new CsvRecordStreamer({
          ...http,
          rowErrorPolicy: config.rowErrorPolicy,
          eventBus: this.eventBus,
          logger: componentLogger('CsvRecordStreamer'),
        }),
      eventBus: this.eventBus,
      logger: componentLogger('StreamFactory'),
    });

    this.ctx = {
      identifiers: [...config.identifiers],
      factory: this.factory,
      eventBus: this.eventBus,
      logger,
      now: config.now ?? (() => new Date()),
    };
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Resolve a single identifier into a stream handle. */
  createStream(identifier: string): Promise<ResolvedStream> {
    return this.factory.createStream(identifier);
  }

  discover(): Promise<Catalog> {
    return new DiscoverCatalog(this.ctx).execute();
  }

  sync(writer: MessageWriter): Promise<SyncSummary> {
    return new SyncStreams(this.ctx).execute(writer);
  }
}

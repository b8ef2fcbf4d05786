import type { Logger } from 'pino';
import type { MetadataResolver } from '../domain/ports/MetadataResolver.js';
import type { SchemaFetcher } from '../domain/ports/SchemaFetcher.js';
import type { RecordStreamer } from '../domain/ports/RecordStreamer.js';
import type { ResolvedStream, UnresolvedStream } from '../domain/model/StreamHandle.js';
import type { DatasetRecord } from '../domain/model/Record.js';
import type { EventBus } from './EventBus.js';
import { unresolvedStream } from '../domain/model/StreamHandle.js';
import { slugify } from '../domain/services/slugify.js';
import { toJsonSchema } from '../domain/services/JsonSchemaBuilder.js';
import { MalformedMetadataError } from '../domain/errors/CatalogErrors.js';
import { createChildLogger } from '../infrastructure/logging/logger.js';

export interface StreamFactoryDeps {
  readonly resolver: MetadataResolver;
  readonly schemaFetcher: SchemaFetcher;
  readonly streamer: RecordStreamer;
  readonly eventBus?: EventBus;
  readonly logger?: Logger;
}

/**
 * Turns dataset identifiers into named, schema-bound streams.
 *
 * Nothing is cached: every `createStream()` and every `records()` call runs the
 * whole resolve / schema / payload chain again.
 */
export class StreamFactory {
  private readonly logger: Logger;

  constructor(private readonly deps: StreamFactoryDeps) {
    this.logger = deps.logger ?? createChildLogger({ component: 'StreamFactory' });
  }

  createStream(identifier: string): Promise<ResolvedStream> {
    return this.resolve(unresolvedStream(identifier));
  }

  async resolve(handle: UnresolvedStream): Promise<ResolvedStream> {
    const { identifier } = handle;
    const { resolver, schemaFetcher, eventBus } = this.deps;

    const descriptor = await resolver.resolve(identifier);
    eventBus?.emit({ type: 'dataset:resolved', identifier, title: descriptor.title, timestamp: Date.now() });

    const name = slugify(descriptor.title);
    if (name === '') {
      throw new MalformedMetadataError(identifier, `title '${descriptor.title}' does not yield a stream name`);
    }

    const schema = await schemaFetcher.fetchSchema(descriptor);
    for (const issue of schema.issues) {
      this.logger.warn({ identifier, stream: name, code: issue.code }, issue.message);
      eventBus?.emit({ type: 'schema:issue', identifier, issue, timestamp: Date.now() });
    }

    eventBus?.emit({
      type: 'schema:resolved',
      identifier,
      stream: name,
      columnCount: schema.columns.length,
      primaryKey: schema.primaryKey,
      timestamp: Date.now(),
    });

    return {
      identifier,
      name,
      descriptor,
      schema,
      jsonSchema: toJsonSchema(schema),
      keyProperties: [schema.primaryKey],
      records: () => this.records(identifier),
    };
  }

  private async *records(identifier: string): AsyncGenerator<DatasetRecord> {
    const { resolver, schemaFetcher, streamer } = this.deps;
    const descriptor = await resolver.resolve(identifier);
    const schema = await schemaFetcher.fetchSchema(descriptor);
    yield* streamer.stream(descriptor, schema);
  }
}

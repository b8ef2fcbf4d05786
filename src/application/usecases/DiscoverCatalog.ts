import type { JsonSchemaObject } from '../../domain/services/JsonSchemaBuilder.js';
import type { TapContext } from '../TapContext.js';

export interface CatalogEntry {
  readonly tap_stream_id: string;
  readonly stream: string;
  /** Dataset IRI the stream was resolved from. */
  readonly identifier: string;
  readonly schema: JsonSchemaObject;
  readonly key_properties: readonly string[];
}

export interface Catalog {
  readonly streams: readonly CatalogEntry[];
}

/** Use case: resolve every configured identifier, one after the other, and describe the resulting streams. */
export class DiscoverCatalog {
  constructor(private readonly ctx: TapContext) {}

  async execute(): Promise<Catalog> {
    const streams: CatalogEntry[] = [];

    for (const identifier of this.ctx.identifiers) {
      const stream = await this.ctx.factory.createStream(identifier);
      streams.push({
        tap_stream_id: stream.name,
        stream: stream.name,
        identifier,
        schema: stream.jsonSchema,
        key_properties: stream.keyProperties,
      });
    }

    this.ctx.logger.info({ streams: streams.length }, 'Discovery finished');
    return { streams };
  }
}

import type { MessageWriter, RecordMessage } from '../../domain/ports/MessageWriter.js';
import type { DatasetRecord } from '../../domain/model/Record.js';
import type { TapContext } from '../TapContext.js';
import { CatalogError } from '../../domain/errors/CatalogErrors.js';
import { formatDate } from '../../domain/services/ValueCaster.js';

export interface StreamSummary {
  readonly identifier: string;
  readonly stream: string;
  readonly recordCount: number;
}

export interface SyncSummary {
  readonly streams: readonly StreamSummary[];
  readonly elapsedMs: number;
}

function serializeRecord(record: DatasetRecord): RecordMessage['record'] {
  const serialized: Record<string, string | number | null> = {};
  for (const [key, value] of Object.entries(record)) {
    serialized[key] = value instanceof Date ? formatDate(value) : value;
  }
  return serialized;
}

/**
 * Use case: emit SCHEMA, RECORD and STATE messages for every configured stream.
 *
 * Streams run strictly in sequence. The first failing stream stops the run; its
 * error is reported through `stream:failed` and rethrown.
 */
export class SyncStreams {
  constructor(private readonly ctx: TapContext) {}

  async execute(writer: MessageWriter): Promise<SyncSummary> {
    const startedAt = Date.now();
    const summaries: StreamSummary[] = [];
    const bookmarks: Record<string, { completed_at: string }> = {};

    for (const identifier of this.ctx.identifiers) {
      const summary = await this.syncOne(identifier, writer);
      summaries.push(summary);
      bookmarks[summary.stream] = { completed_at: this.ctx.now().toISOString() };
      writer.write({ type: 'STATE', value: { bookmarks: { ...bookmarks } } });
    }

    return { streams: summaries, elapsedMs: Date.now() - startedAt };
  }

  private async syncOne(identifier: string, writer: MessageWriter): Promise<StreamSummary> {
    const logger = this.ctx.logger.child({ identifier });

    try {
      const stream = await this.ctx.factory.createStream(identifier);
      writer.write({
        type: 'SCHEMA',
        stream: stream.name,
        schema: stream.jsonSchema,
        key_properties: stream.keyProperties,
      });

      let recordCount = 0;
      for await (const record of stream.records()) {
        writer.write({
          type: 'RECORD',
          stream: stream.name,
          record: serializeRecord(record),
          time_extracted: this.ctx.now().toISOString(),
        });
        recordCount++;
      }

      logger.info({ stream: stream.name, records: recordCount }, 'Stream synced');
      this.ctx.eventBus.emit({
        type: 'stream:completed',
        identifier,
        stream: stream.name,
        recordCount,
        timestamp: Date.now(),
      });

      return { identifier, stream: stream.name, recordCount };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ err: error }, 'Stream failed');
      this.ctx.eventBus.emit({
        type: 'stream:failed',
        identifier,
        error: message,
        ...(error instanceof CatalogError ? { code: error.code } : {}),
        timestamp: Date.now(),
      });
      throw error;
    }
  }
}

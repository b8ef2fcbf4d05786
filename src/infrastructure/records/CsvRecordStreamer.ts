import type { Logger } from 'pino';
import type { RecordStreamer, RowErrorPolicy } from '../../domain/ports/RecordStreamer.js';
import type { DatasetDescriptor } from '../../domain/model/DatasetDescriptor.js';
import type { DocumentSchema } from '../../domain/model/DocumentSchema.js';
import type { DatasetRecord } from '../../domain/model/Record.js';
import type { HttpOptions } from '../http/fetchWithTimeout.js';
import type { EventBus } from '../../application/EventBus.js';
import type { CsvRow } from '../parsers/CsvParser.js';
import { RecordBuilder } from '../../domain/services/RecordBuilder.js';
import { RowCastError } from '../../domain/errors/CatalogErrors.js';
import { CsvParser, CSV_SNIFF_SAMPLE_SIZE } from '../parsers/CsvParser.js';
import { UrlSource } from '../sources/UrlSource.js';
import { TempFileBuffer } from '../buffers/TempFileBuffer.js';
import { createChildLogger } from '../logging/logger.js';

export interface CsvRecordStreamerOptions extends HttpOptions {
  /** Leading bytes inspected for dialect detection. Default: `8192`. */
  readonly sampleSize?: number;
  /** Default: `'fail'`. */
  readonly rowErrorPolicy?: RowErrorPolicy;
  readonly eventBus?: EventBus;
  readonly logger?: Logger;
}

/**
 * Streams a distribution's CSV payload as typed records.
 *
 * The payload is fetched in full and held in a temporary file. Rows are parsed from a
 * read stream over that file as the consumer pulls them, and the file is removed when
 * iteration ends, whether it runs out, fails or is stopped early.
 */
export class CsvRecordStreamer implements RecordStreamer {
  private readonly options: CsvRecordStreamerOptions;
  private readonly sampleSize: number;
  private readonly rowErrorPolicy: RowErrorPolicy;
  private readonly parser = new CsvParser();
  private readonly logger: Logger;

  constructor(options?: CsvRecordStreamerOptions) {
    this.options = options ?? {};
    this.sampleSize = options?.sampleSize ?? CSV_SNIFF_SAMPLE_SIZE;
    this.rowErrorPolicy = options?.rowErrorPolicy ?? 'fail';
    this.logger = options?.logger ?? createChildLogger({ component: 'CsvRecordStreamer' });
  }

  async *stream(descriptor: DatasetDescriptor, schema: DocumentSchema): AsyncGenerator<DatasetRecord> {
    const { identifier } = descriptor;
    const url = descriptor.distribution.accessUrl;
    this.logger.info({ identifier, url }, 'Retrieving dataset payload');

    const source = new UrlSource(url, { headers: this.options.headers, timeout: this.options.timeout });
    const payload = await source.read();

    const buffer = await TempFileBuffer.create();
    try {
      const byteLength = await buffer.write(payload.text);
      const sample = await buffer.sample(this.sampleSize);
      const dialect = this.parser.detect(sample, { truncated: byteLength > this.sampleSize });

      this.logger.debug({ identifier, dialect, byteLength, charset: payload.charset }, 'Detected CSV dialect');
      this.options.eventBus?.emit({ type: 'dialect:detected', identifier, dialect, timestamp: Date.now() });

      const builder = new RecordBuilder(schema);

      for await (const entry of this.parser.parse(buffer.stream(), dialect)) {
        if (entry.kind === 'header') {
          this.warnOnHeaderMismatch(identifier, builder, entry.fields);
          continue;
        }
        let record: DatasetRecord;
        try {
          record = this.toRecord(builder, entry);
        } catch (error) {
          if (this.rowErrorPolicy === 'skip' && error instanceof RowCastError) {
            this.skipRow(identifier, error);
            continue;
          }
          throw error;
        }
        yield record;
      }
    } finally {
      await buffer.release();
      this.logger.debug({ identifier, path: buffer.path }, 'Released payload buffer');
    }
  }

  private toRecord(builder: RecordBuilder, row: CsvRow): DatasetRecord {
    if (row.problem !== null) {
      throw new RowCastError(row.rowNumber, null, undefined, row.problem);
    }
    return builder.build(row.values, row.rowNumber);
  }

  private skipRow(identifier: string, error: RowCastError): void {
    this.logger.warn({ identifier, row: error.row, column: error.column }, `Skipping row: ${error.message}`);
    this.options.eventBus?.emit({
      type: 'row:skipped',
      identifier,
      row: error.row,
      column: error.column,
      error: error.message,
      timestamp: Date.now(),
    });
  }

  private warnOnHeaderMismatch(identifier: string, builder: RecordBuilder, header: readonly string[]): void {
    const missing = builder.missingColumns(header);
    if (missing.length > 0) {
      this.logger.warn({ identifier, columns: missing }, 'Schema columns missing from payload header');
    }
    const unknown = builder.unknownColumns(header);
    if (unknown.length > 0) {
      this.logger.warn({ identifier, columns: unknown }, 'Payload columns not declared in schema are dropped');
    }
  }
}

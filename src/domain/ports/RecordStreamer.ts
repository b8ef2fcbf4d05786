import type { DatasetDescriptor } from '../model/DatasetDescriptor.js';
import type { DocumentSchema } from '../model/DocumentSchema.js';
import type { DatasetRecord } from '../model/Record.js';

/** How a row that cannot be cast is handled: end the stream, or drop the row and go on. */
export type RowErrorPolicy = 'fail' | 'skip';

export interface RecordStreamer {
  /**
   * Lazily fetch the payload and yield one record per data row, in payload order.
   * Each iteration fetches the payload again.
   */
  stream(descriptor: DatasetDescriptor, schema: DocumentSchema): AsyncIterable<DatasetRecord>;
}

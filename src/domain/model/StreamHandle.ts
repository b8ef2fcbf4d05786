import type { DatasetDescriptor } from './DatasetDescriptor.js';
import type { DocumentSchema } from './DocumentSchema.js';
import type { DatasetRecord } from './Record.js';
import type { JsonSchemaObject } from '../services/JsonSchemaBuilder.js';

/** A stream known only by its dataset identifier. Nothing has been fetched yet. */
export interface UnresolvedStream {
  readonly identifier: string;
}

/** A stream whose metadata and schema have been discovered. */
export interface ResolvedStream extends UnresolvedStream {
  /** Stable stream name derived from the dataset title. */
  readonly name: string;
  readonly descriptor: DatasetDescriptor;
  readonly schema: DocumentSchema;
  readonly jsonSchema: JsonSchemaObject;
  readonly keyProperties: readonly string[];
  /** Run the full resolve, schema and payload chain again and yield its records. */
  records(): AsyncIterable<DatasetRecord>;
}

export function unresolvedStream(identifier: string): UnresolvedStream {
  return { identifier };
}

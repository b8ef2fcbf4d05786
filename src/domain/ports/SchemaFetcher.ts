import type { DatasetDescriptor } from '../model/DatasetDescriptor.js';
import type { DocumentSchema } from '../model/DocumentSchema.js';

export interface SchemaFetcher {
  /**
   * Fetch and parse the schema document of the descriptor's distribution.
   *
   * @throws SchemaUnavailableError on transport failure or a non-2xx status.
   * @throws MalformedSchemaError when the document is not JSON or lacks required fields.
   */
  fetchSchema(descriptor: DatasetDescriptor): Promise<DocumentSchema>;
}

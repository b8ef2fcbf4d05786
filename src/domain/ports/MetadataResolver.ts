import type { DatasetDescriptor } from '../model/DatasetDescriptor.js';

export interface MetadataResolver {
  /**
   * Resolve a dataset identifier to its metadata.
   *
   * @throws MetadataNotFoundError when the catalog has no such dataset.
   * @throws MetadataServiceError on transport or protocol failure.
   * @throws MalformedMetadataError when required fields are missing or the dataset
   *   does not have exactly one distribution.
   */
  resolve(identifier: string): Promise<DatasetDescriptor>;
}

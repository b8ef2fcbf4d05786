import type { Distribution } from './Distribution.js';
import { classifyDistributions } from './Distribution.js';
import { MalformedMetadataError } from '../errors/CatalogErrors.js';

/** Metadata of a single dataset, as resolved from the catalog. Immutable. */
export interface DatasetDescriptor {
  /** Dataset IRI. */
  readonly identifier: string;
  readonly title: string;
  readonly description: string;
  /** Periodicity code (e.g. an EU frequency IRI). */
  readonly accrualPeriodicity?: string;
  /** URL of human-readable documentation. */
  readonly documentation?: string;
  /** IRI of the parent dataset, for datasets that are part of a series. */
  readonly isPartOf?: string;
  readonly distribution: Distribution;
}

export interface DatasetDescriptorInput {
  readonly identifier: string;
  readonly title: string;
  readonly description: string;
  readonly accrualPeriodicity?: string | null;
  readonly documentation?: string | null;
  readonly isPartOf?: string | null;
  readonly distributions: readonly Distribution[];
}

/**
 * Build a descriptor from resolved metadata.
 *
 * Rejects datasets with no distribution and datasets with more than one; a dataset
 * with several distributions is never narrowed to its first one.
 */
export function createDatasetDescriptor(input: DatasetDescriptorInput): DatasetDescriptor {
  const set = classifyDistributions(input.distributions);

  switch (set.kind) {
    case 'none':
      throw new MalformedMetadataError(input.identifier, 'no distribution found');
    case 'multiple':
      throw new MalformedMetadataError(
        input.identifier,
        `dataset has ${String(set.distributions.length)} distributions, only one is supported`,
      );
    case 'single':
      break;
  }

  const { accessUrl, conformsTo } = set.distribution;
  if (accessUrl.trim() === '') {
    throw new MalformedMetadataError(input.identifier, 'distribution has an empty accessURL');
  }
  if (conformsTo.trim() === '') {
    throw new MalformedMetadataError(input.identifier, 'distribution has an empty conformsTo');
  }

  return Object.freeze({
    identifier: input.identifier,
    title: input.title,
    description: input.description,
    ...(input.accrualPeriodicity ? { accrualPeriodicity: input.accrualPeriodicity } : {}),
    ...(input.documentation ? { documentation: input.documentation } : {}),
    ...(input.isPartOf ? { isPartOf: input.isPartOf } : {}),
    distribution: Object.freeze({ accessUrl, conformsTo }),
  });
}

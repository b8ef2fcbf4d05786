/** One physical representation of a dataset: where the payload lives and where its schema lives. */
export interface Distribution {
  readonly accessUrl: string;
  readonly conformsTo: string;
}

/** Classification of a dataset's distribution list. Only `single` is supported downstream. */
export type DistributionSet =
  | { readonly kind: 'none' }
  | { readonly kind: 'single'; readonly distribution: Distribution }
  | { readonly kind: 'multiple'; readonly distributions: readonly Distribution[] };

export function classifyDistributions(distributions: readonly Distribution[]): DistributionSet {
  if (distributions.length === 0) return { kind: 'none' };
  const [first] = distributions;
  if (distributions.length === 1 && first) return { kind: 'single', distribution: first };
  return { kind: 'multiple', distributions };
}

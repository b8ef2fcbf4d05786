import { buildClientSchema, getIntrospectionQuery, parse, validate } from 'graphql';
import type { DocumentNode, IntrospectionQuery } from 'graphql';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { MetadataResolver } from '../../domain/ports/MetadataResolver.js';
import type { DatasetDescriptor } from '../../domain/model/DatasetDescriptor.js';
import type { HttpOptions } from '../http/fetchWithTimeout.js';
import { createDatasetDescriptor } from '../../domain/model/DatasetDescriptor.js';
import {
  ConfigurationError,
  MalformedMetadataError,
  MetadataNotFoundError,
  MetadataServiceError,
} from '../../domain/errors/CatalogErrors.js';
import { DEFAULT_TIMEOUT_MS, describeError, describeStatus, fetchWithTimeout } from '../http/fetchWithTimeout.js';
import { createChildLogger } from '../logging/logger.js';

export const DEFAULT_METADATA_ENDPOINT = 'https://data.gov.cz/graphql';
export const DEFAULT_LOCALE = 'cs';

const GRAPHQL_NAME = /^[_A-Za-z][_0-9A-Za-z]*$/;

export interface GraphQLMetadataResolverOptions extends HttpOptions {
  /** GraphQL endpoint. Default: the national catalog at data.gov.cz. */
  readonly endpoint?: string;
  /** The single language variant requested for title and description. Default: `'cs'`. */
  readonly locale?: string;
  /** Introspect the service and validate the query against its schema before each call. Default: `true`. */
  readonly validateQuery?: boolean;
  readonly logger?: Logger;
}

const GraphQLEnvelopeSchema = z.object({
  data: z.record(z.string(), z.unknown()).nullish(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
});

const LocalizedTextSchema = z.record(z.string(), z.string().nullable());

const DatasetSchema = z.object({
  iri: z.string().nullish(),
  accrualPeriodicity: z.string().nullish(),
  documentation: z.string().nullish(),
  isPartOf: z.string().nullish(),
  distribution: z.array(
    z.object({
      accessURL: z.string(),
      conformsTo: z.string(),
    }),
  ),
  title: LocalizedTextSchema,
  description: LocalizedTextSchema,
});

function isIntrospectionQuery(value: unknown): value is IntrospectionQuery {
  return typeof value === 'object' && value !== null && '__schema' in value && typeof value.__schema === 'object';
}

function datasetQuery(locale: string): string {
  return `query Dataset($iri: String!) {
  dataset(iri: $iri) {
    iri
    accrualPeriodicity
    documentation
    isPartOf
    distribution {
      accessURL
      conformsTo
    }
    description {
      ${locale}
    }
    title {
      ${locale}
    }
  }
}`;
}

/**
 * Resolves dataset IRIs through the catalog's GraphQL API.
 *
 * Every call is a fresh round trip: the service schema is introspected again and
 * nothing is cached between calls.
 */
export class GraphQLMetadataResolver implements MetadataResolver {
  private readonly endpoint: string;
  private readonly locale: string;
  private readonly validateQuery: boolean;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number;
  private readonly query: string;
  private readonly document: DocumentNode;
  private readonly logger: Logger;

  constructor(options?: GraphQLMetadataResolverOptions) {
    this.endpoint = options?.endpoint ?? DEFAULT_METADATA_ENDPOINT;
    this.locale = options?.locale ?? DEFAULT_LOCALE;
    this.validateQuery = options?.validateQuery ?? true;
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout ?? DEFAULT_TIMEOUT_MS;
    this.logger = options?.logger ?? createChildLogger({ component: 'GraphQLMetadataResolver' });

    if (!GRAPHQL_NAME.test(this.locale)) {
      throw new ConfigurationError(`Locale '${this.locale}' is not a valid GraphQL field name`);
    }

    this.query = datasetQuery(this.locale);
    this.document = parse(this.query);
  }

  async resolve(identifier: string): Promise<DatasetDescriptor> {
    this.logger.info({ identifier }, 'Retrieving dataset metadata');

    if (this.validateQuery) {
      await this.assertQueryValid();
    }

    this.logger.debug({ identifier, query: this.query }, 'Executing GraphQL query');
    const data = await this.execute(this.query, { iri: identifier });

    const dataset = data['dataset'];
    if (dataset === null || dataset === undefined) {
      throw new MetadataNotFoundError(identifier);
    }

    const parsed = DatasetSchema.safeParse(dataset);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new MalformedMetadataError(identifier, details);
    }

    const title = parsed.data.title[this.locale];
    const description = parsed.data.description[this.locale];
    if (typeof title !== 'string') {
      throw new MalformedMetadataError(identifier, `title has no '${this.locale}' variant`);
    }
    if (typeof description !== 'string') {
      throw new MalformedMetadataError(identifier, `description has no '${this.locale}' variant`);
    }

    return createDatasetDescriptor({
      identifier,
      title,
      description,
      accrualPeriodicity: parsed.data.accrualPeriodicity,
      documentation: parsed.data.documentation,
      isPartOf: parsed.data.isPartOf,
      distributions: parsed.data.distribution.map((d) => ({ accessUrl: d.accessURL, conformsTo: d.conformsTo })),
    });
  }

  private async assertQueryValid(): Promise<void> {
    const data = await this.execute(getIntrospectionQuery());
    if (!isIntrospectionQuery(data)) {
      throw new MetadataServiceError(`Introspection of ${this.endpoint} returned no schema`);
    }

    let errors: readonly { message: string }[];
    try {
      errors = validate(buildClientSchema(data), this.document);
    } catch (error) {
      throw new MetadataServiceError(`Invalid introspection result from ${this.endpoint}: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (errors.length > 0) {
      throw new MetadataServiceError(
        `Dataset query does not match the schema of ${this.endpoint}: ${errors.map((e) => e.message).join('; ')}`,
      );
    }
  }

  private async execute(query: string, variables?: Record<string, unknown>): Promise<Record<string, unknown>> {
    let response: Response;
    try {
      response = await fetchWithTimeout(
        this.endpoint,
        {
          method: 'POST',
          headers: { 'content-type': 'application/json', accept: 'application/json', ...this.headers },
          body: JSON.stringify(variables ? { query, variables } : { query }),
        },
        this.timeout,
      );
    } catch (error) {
      throw new MetadataServiceError(`Request to ${this.endpoint} failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new MetadataServiceError(`Request to ${this.endpoint} failed: ${describeStatus(response)}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(await response.text());
    } catch (error) {
      throw new MetadataServiceError(`Response from ${this.endpoint} is not JSON`, { cause: error });
    }

    const envelope = GraphQLEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new MetadataServiceError(`Response from ${this.endpoint} is not a GraphQL response`);
    }

    const { data, errors } = envelope.data;
    if (errors && errors.length > 0) {
      throw new MetadataServiceError(`GraphQL errors from ${this.endpoint}: ${errors.map((e) => e.message).join('; ')}`);
    }
    if (!data) {
      throw new MetadataServiceError(`Response from ${this.endpoint} has no data`);
    }

    return data;
  }
}

import type { Logger } from 'pino';
import { z } from 'zod';
import type { SchemaFetcher } from '../../domain/ports/SchemaFetcher.js';
import type { DatasetDescriptor } from '../../domain/model/DatasetDescriptor.js';
import type { DocumentSchema } from '../../domain/model/DocumentSchema.js';
import type { ColumnDefinition } from '../../domain/model/ColumnDefinition.js';
import type { HttpOptions } from '../http/fetchWithTimeout.js';
import { ColumnDatatype, resolveDatatype } from '../../domain/model/ColumnDefinition.js';
import { createDocumentSchema, findDuplicateColumns } from '../../domain/model/DocumentSchema.js';
import { MalformedSchemaError, SchemaUnavailableError } from '../../domain/errors/CatalogErrors.js';
import { DEFAULT_TIMEOUT_MS, describeError, describeStatus, fetchWithTimeout } from '../http/fetchWithTimeout.js';
import { createChildLogger } from '../logging/logger.js';

export interface HttpSchemaFetcherOptions extends HttpOptions {
  readonly logger?: Logger;
}

const TitlesSchema = z.union([
  z.string(),
  z.array(z.string()),
  z.record(z.string(), z.union([z.string(), z.array(z.string())])),
]);

const ColumnSchema = z.object({
  name: z.string().min(1),
  titles: TitlesSchema.optional(),
  'dc:description': z.string().optional(),
  description: z.string().optional(),
  required: z.boolean().optional(),
  datatype: z.unknown().optional(),
});

const TableSchemaSchema = z.object({
  primaryKey: z.union([z.string().min(1), z.array(z.string().min(1)).length(1)]),
  columns: z.array(ColumnSchema).min(1),
});

type ColumnDocument = z.infer<typeof ColumnSchema>;

function firstTitle(titles: ColumnDocument['titles']): string | undefined {
  if (titles === undefined) return undefined;
  if (typeof titles === 'string') return titles;
  if (Array.isArray(titles)) return titles[0];
  for (const value of Object.values(titles)) {
    const title = typeof value === 'string' ? value : value[0];
    if (title !== undefined) return title;
  }
  return undefined;
}

/** The declared datatype name, or `null` when the value names none. */
function declaredDatatypeOf(datatype: unknown): string | null {
  if (datatype === undefined) return 'string';
  if (typeof datatype === 'string') return datatype;
  if (typeof datatype === 'object' && datatype !== null && 'base' in datatype && typeof datatype.base === 'string') {
    return datatype.base;
  }
  return null;
}

function toColumnDefinition(column: ColumnDocument): ColumnDefinition {
  const declared = declaredDatatypeOf(column.datatype);
  const declaredDatatype = declared ?? JSON.stringify(column.datatype);
  const { datatype, recognized } =
    declared === null ? { datatype: ColumnDatatype.TEXT, recognized: false } : resolveDatatype(declared);

  return {
    name: column.name,
    title: firstTitle(column.titles) ?? column.name,
    description: column['dc:description'] ?? column.description ?? '',
    required: column.required ?? false,
    datatype,
    declaredDatatype,
    recognized,
  };
}

/**
 * Fetches CSVW-style table schemas from a distribution's `conformsTo` URL.
 *
 * Accepts both `{ tableSchema: { primaryKey, columns } }` and the flat
 * `{ primaryKey, columns }` layout.
 */
export class HttpSchemaFetcher implements SchemaFetcher {
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number;
  private readonly logger: Logger;

  constructor(options?: HttpSchemaFetcherOptions) {
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout ?? DEFAULT_TIMEOUT_MS;
    this.logger = options?.logger ?? createChildLogger({ component: 'HttpSchemaFetcher' });
  }

  async fetchSchema(descriptor: DatasetDescriptor): Promise<DocumentSchema> {
    const url = descriptor.distribution.conformsTo;
    this.logger.info({ identifier: descriptor.identifier, url }, 'Retrieving dataset schema');

    let response: Response;
    try {
      response = await fetchWithTimeout(
        url,
        { method: 'GET', headers: { accept: 'application/json', ...this.headers } },
        this.timeout,
      );
    } catch (error) {
      throw new SchemaUnavailableError(url, describeError(error), { cause: error });
    }

    if (!response.ok) {
      throw new SchemaUnavailableError(url, describeStatus(response));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(await response.text());
    } catch (error) {
      throw new MalformedSchemaError(url, 'response is not valid JSON', { cause: error });
    }

    const tableSchema =
      typeof payload === 'object' && payload !== null && 'tableSchema' in payload ? payload.tableSchema : payload;

    const parsed = TableSchemaSchema.safeParse(tableSchema);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new MalformedSchemaError(url, details);
    }

    const columns = parsed.data.columns.map(toColumnDefinition);
    const duplicates = findDuplicateColumns(columns);
    if (duplicates.length > 0) {
      throw new MalformedSchemaError(url, `duplicate column names: ${duplicates.join(', ')}`);
    }

    const unrecognized = columns.filter((c) => !c.recognized);
    if (unrecognized.length > 0) {
      this.logger.debug(
        { identifier: descriptor.identifier, columns: unrecognized.map((c) => `${c.name}:${c.declaredDatatype}`) },
        'Columns with unknown datatypes are passed through as text',
      );
    }

    const { primaryKey } = parsed.data;
    return createDocumentSchema(typeof primaryKey === 'string' ? primaryKey : primaryKey[0], columns);
  }
}

/**
 * Error hierarchy for the catalog pipeline.
 *
 * Every failure the pipeline raises extends {@link CatalogError}, so callers can
 * branch on `instanceof` or on the stable `code`:
 *
 * ```ts
 * try {
 *   await resolver.resolve(iri);
 * } catch (e) {
 *   if (e instanceof MetadataNotFoundError) { ... }
 * }
 * ```
 */

export type CatalogErrorCode =
  | 'METADATA_NOT_FOUND'
  | 'METADATA_SERVICE_ERROR'
  | 'MALFORMED_METADATA'
  | 'SCHEMA_UNAVAILABLE'
  | 'MALFORMED_SCHEMA'
  | 'PAYLOAD_UNAVAILABLE'
  | 'UNSUPPORTED_CONTENT_TYPE'
  | 'DIALECT_DETECTION_ERROR'
  | 'ROW_CAST_ERROR'
  | 'CONFIGURATION_ERROR';

/** Base error for the pipeline. Includes an error code for programmatic matching. */
export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogError';
    this.code = code;
  }
}

/** The metadata service has no dataset for the identifier. */
export class MetadataNotFoundError extends CatalogError {
  readonly identifier: string;

  constructor(identifier: string) {
    super('METADATA_NOT_FOUND', `No dataset found for IRI '${identifier}'`);
    this.name = 'MetadataNotFoundError';
    this.identifier = identifier;
  }
}

/** Transport or protocol failure while talking to the metadata service. */
export class MetadataServiceError extends CatalogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('METADATA_SERVICE_ERROR', message, options);
    this.name = 'MetadataServiceError';
  }
}

/** The metadata response lacks required fields or has an unsupported distribution count. */
export class MalformedMetadataError extends CatalogError {
  readonly identifier: string;

  constructor(identifier: string, message: string) {
    super('MALFORMED_METADATA', `Malformed metadata for IRI '${identifier}': ${message}`);
    this.name = 'MalformedMetadataError';
    this.identifier = identifier;
  }
}

export class SchemaUnavailableError extends CatalogError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('SCHEMA_UNAVAILABLE', `Schema unavailable at ${url}: ${message}`, options);
    this.name = 'SchemaUnavailableError';
    this.url = url;
  }
}

export class MalformedSchemaError extends CatalogError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('MALFORMED_SCHEMA', `Malformed schema at ${url}: ${message}`, options);
    this.name = 'MalformedSchemaError';
    this.url = url;
  }
}

export class PayloadUnavailableError extends CatalogError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('PAYLOAD_UNAVAILABLE', `Payload unavailable at ${url}: ${message}`, options);
    this.name = 'PayloadUnavailableError';
    this.url = url;
  }
}

/** The payload is not declared as `text/csv` (or declares a charset that cannot be decoded). */
export class UnsupportedContentTypeError extends CatalogError {
  /** Raw `Content-Type` header value, `null` when the header was absent. */
  readonly contentType: string | null;

  constructor(contentType: string | null, message?: string) {
    super(
      'UNSUPPORTED_CONTENT_TYPE',
      message ?? `Unsupported content type header ${contentType === null ? '(missing)' : `'${contentType}'`}`,
    );
    this.name = 'UnsupportedContentTypeError';
    this.contentType = contentType;
  }
}

export class DialectDetectionError extends CatalogError {
  constructor(message: string) {
    super('DIALECT_DETECTION_ERROR', `Could not detect CSV dialect: ${message}`);
    this.name = 'DialectDetectionError';
  }
}

/** A single row could not be converted to the declared column types. */
export class RowCastError extends CatalogError {
  /** 1-based data row number (header excluded). */
  readonly row: number;
  /** Offending column, or `null` when the row as a whole is malformed. */
  readonly column: string | null;
  readonly value: string | undefined;

  constructor(row: number, column: string | null, value: string | undefined, reason: string) {
    const location = column === null ? `Row ${String(row)}` : `Row ${String(row)}, column '${column}'`;
    super('ROW_CAST_ERROR', `${location}: ${reason}`);
    this.name = 'RowCastError';
    this.row = row;
    this.column = column;
    this.value = value;
  }
}

export class ConfigurationError extends CatalogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_ERROR', message, options);
    this.name = 'ConfigurationError';
  }
}

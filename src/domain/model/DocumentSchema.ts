import type { ColumnDefinition } from './ColumnDefinition.js';

export type SchemaIssueCode = 'PRIMARY_KEY_NOT_FOUND';

/** A data-quality problem in a schema document that does not prevent streaming. */
export interface SchemaIssue {
  readonly field: string;
  readonly message: string;
  readonly code: SchemaIssueCode;
}

export interface DocumentSchema {
  readonly primaryKey: string;
  /** Canonical column order. */
  readonly columns: readonly ColumnDefinition[];
  readonly issues: readonly SchemaIssue[];
}

/**
 * Build a schema, flagging a primary key that does not name a column.
 *
 * Duplicate column names are the caller's concern: they make records ambiguous
 * and are rejected before this point.
 */
export function createDocumentSchema(primaryKey: string, columns: readonly ColumnDefinition[]): DocumentSchema {
  const issues: SchemaIssue[] = [];

  if (!columns.some((c) => c.name === primaryKey)) {
    issues.push({
      field: primaryKey,
      message: `Primary key '${primaryKey}' does not reference any column`,
      code: 'PRIMARY_KEY_NOT_FOUND',
    });
  }

  return { primaryKey, columns, issues };
}

export function hasIssues(schema: DocumentSchema): boolean {
  return schema.issues.length > 0;
}

/** Names of columns that appear more than once, in first-seen order. */
export function findDuplicateColumns(columns: readonly Pick<ColumnDefinition, 'name'>[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const { name } of columns) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  return [...duplicates];
}

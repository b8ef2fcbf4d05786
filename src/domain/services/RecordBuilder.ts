import type { DocumentSchema } from '../model/DocumentSchema.js';
import type { ColumnDefinition } from '../model/ColumnDefinition.js';
import type { DatasetRecord, RawRow, RecordValue } from '../model/Record.js';
import { ColumnDatatype } from '../model/ColumnDefinition.js';
import { RowCastError } from '../errors/CatalogErrors.js';
import { castValue } from './ValueCaster.js';

/**
 * Converts parsed CSV rows into typed records.
 *
 * The output always has exactly one key per schema column, in schema order.
 * Header columns the schema does not declare are dropped.
 */
export class RecordBuilder {
  constructor(private readonly schema: DocumentSchema) {}

  /**
   * @param rowNumber - 1-based data row number, used in error messages.
   * @throws RowCastError when any cell cannot be converted.
   */
  build(row: RawRow, rowNumber: number): DatasetRecord {
    const record: Record<string, RecordValue> = {};

    for (const column of this.schema.columns) {
      record[column.name] = this.convert(column, row[column.name], rowNumber);
    }

    return record;
  }

  /** Schema columns absent from a payload header. */
  missingColumns(header: readonly string[]): string[] {
    const present = new Set(header);
    return this.schema.columns.filter((c) => !present.has(c.name)).map((c) => c.name);
  }

  /** Header columns the schema does not declare. */
  unknownColumns(header: readonly string[]): string[] {
    const declared = new Set(this.schema.columns.map((c) => c.name));
    return header.filter((name) => !declared.has(name));
  }

  private convert(column: ColumnDefinition, raw: string | undefined, rowNumber: number): RecordValue {
    if (raw === undefined) {
      if (column.required) {
        throw new RowCastError(rowNumber, column.name, raw, 'required value is missing');
      }
      return null;
    }

    if (column.datatype === ColumnDatatype.TEXT) return raw;

    if (raw.trim() === '') {
      if (column.required) {
        throw new RowCastError(rowNumber, column.name, raw, 'required value is empty');
      }
      return null;
    }

    const result = castValue(column.datatype, raw);
    if (!result.ok) {
      throw new RowCastError(rowNumber, column.name, raw, result.reason);
    }
    return result.value;
  }
}

/** A typed cell value. Dates are calendar dates at UTC midnight. */
export type RecordValue = string | number | Date | null;

/** One converted payload row, keyed by schema column name. */
export interface DatasetRecord {
  readonly [column: string]: RecordValue;
}

/** One payload row as parsed from CSV, keyed by header name. Absent cells are `undefined`. */
export interface RawRow {
  readonly [column: string]: string | undefined;
}

export const ColumnDatatype = {
  TEXT: 'text',
  DATE: 'date',
  NUMBER: 'number',
} as const;

export type ColumnDatatype = (typeof ColumnDatatype)[keyof typeof ColumnDatatype];

export interface ColumnDefinition {
  /** Column name as it appears in the CSV header. Used as the record key. */
  readonly name: string;
  /** Display title. */
  readonly title: string;
  readonly description: string;
  readonly required: boolean;
  readonly datatype: ColumnDatatype;
  /** Datatype as written in the schema document. */
  readonly declaredDatatype: string;
  /** `false` when `declaredDatatype` is unknown and the column degraded to text. */
  readonly recognized: boolean;
}

const DECLARED_DATATYPES: Readonly<Record<string, ColumnDatatype>> = {
  string: ColumnDatatype.TEXT,
  date: ColumnDatatype.DATE,
  number: ColumnDatatype.NUMBER,
};

/** Map a declared datatype to a column datatype. Unknown datatypes become text, never an error. */
export function resolveDatatype(declared: string): { datatype: ColumnDatatype; recognized: boolean } {
  const datatype = Object.hasOwn(DECLARED_DATATYPES, declared) ? DECLARED_DATATYPES[declared] : undefined;
  return datatype ? { datatype, recognized: true } : { datatype: ColumnDatatype.TEXT, recognized: false };
}

export interface CsvDialect {
  readonly delimiter: string;
  readonly quoteChar: string;
}

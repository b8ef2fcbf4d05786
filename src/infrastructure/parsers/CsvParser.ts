import Papa from 'papaparse';
import type { Readable } from 'node:stream';
import type { CsvDialect } from '../../domain/model/CsvDialect.js';
import type { RawRow } from '../../domain/model/Record.js';
import { DialectDetectionError } from '../../domain/errors/CatalogErrors.js';

/** Number of leading payload bytes inspected by {@link CsvParser.detect}. */
export const CSV_SNIFF_SAMPLE_SIZE = 8192;

/** Share of sampled rows that must agree on the delimiter's field count. */
export const CSV_CONSISTENCY_THRESHOLD = 0.9;

const DELIMITERS = [',', ';', '\t', '|'] as const;
const QUOTE_CHARS = ['"', "'"] as const;

/** Parsed rows held before the source stream is paused. */
const ROW_QUEUE_LIMIT = 1000;

export interface CsvHeader {
  readonly kind: 'header';
  /** Header fields in payload order. */
  readonly fields: readonly string[];
}

export interface CsvRow {
  readonly kind: 'row';
  /** 1-based data row number; blank lines are not counted. */
  readonly rowNumber: number;
  readonly values: RawRow;
  /** Why the row is malformed, or `null` when it parsed cleanly. */
  readonly problem: string | null;
}

/** The header comes first, then one entry per data row. */
export type CsvEntry = CsvHeader | CsvRow;

export interface DetectOptions {
  /** The sample was cut from a longer payload, so its last row may be partial. */
  readonly truncated?: boolean;
}

interface Candidate {
  readonly delimiter: string;
  readonly width: number;
  readonly strayQuotes: number;
}

interface ParsedLine {
  readonly cells: readonly string[];
  readonly errors: readonly string[];
}

function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

function isBlank(cells: readonly string[]): boolean {
  return cells.length === 1 && cells[0] === '';
}

/** CSV parser adapter using PapaParse, with delimiter and quote detection from a sample. */
export class CsvParser {
  /**
   * Parse a payload stream with a header row, yielding rows as PapaParse steps through them.
   *
   * Quote errors and rows wider than the header are reported through `problem`
   * instead of being merged or truncated silently. The source is paused while
   * the consumer falls behind and destroyed when iteration stops.
   *
   * @throws DialectDetectionError when the header row itself is malformed.
   */
  async *parse(input: Readable, dialect: CsvDialect): AsyncGenerator<CsvEntry> {
    const queue: ParsedLine[] = [];
    let finished = false;
    let failure: Error | undefined;
    let wake: (() => void) | undefined;

    const notify = (): void => {
      wake?.();
      wake = undefined;
    };

    Papa.parse<string[]>(input, {
      header: false,
      delimiter: dialect.delimiter,
      quoteChar: dialect.quoteChar,
      skipEmptyLines: true,
      dynamicTyping: false,
      step: (result) => {
        queue.push({ cells: result.data, errors: result.errors.map((e) => e.message) });
        if (queue.length >= ROW_QUEUE_LIMIT) input.pause();
        notify();
      },
      complete: () => {
        finished = true;
        notify();
      },
      error: (error) => {
        failure = error;
        finished = true;
        notify();
      },
    });

    let fields: string[] | undefined;
    let rowNumber = 0;

    try {
      for (;;) {
        const line = queue.shift();
        if (line) {
          if (!fields) {
            const [firstError] = line.errors;
            if (firstError !== undefined) {
              throw new DialectDetectionError(`header row is malformed: ${firstError}`);
            }
            fields = line.cells.map((cell, index) => (index === 0 ? stripBom(cell) : cell));
            yield { kind: 'header', fields };
            continue;
          }
          rowNumber++;
          yield this.toRow(line, fields, rowNumber);
          continue;
        }

        if (failure) throw failure;
        if (finished) return;
        await new Promise<void>((resolve) => {
          wake = resolve;
          if (input.isPaused()) input.resume();
        });
      }
    } finally {
      input.destroy();
    }
  }

  /**
   * Infer the dialect from a leading sample.
   *
   * A delimiter qualifies when its most common field count is at least two, the
   * header row has that count, and at least {@link CSV_CONSISTENCY_THRESHOLD} of
   * the sampled rows parse cleanly to it. The widest qualifying delimiter wins;
   * ties are broken by fewer quote characters left inside fields, then by
   * candidate order.
   *
   * @throws DialectDetectionError when no delimiter qualifies.
   */
  detect(sample: string, options?: DetectOptions): CsvDialect {
    const content = stripBom(sample);
    if (content.trim() === '') {
      throw new DialectDetectionError('sample is empty');
    }

    // A sample ending on a line break holds only complete rows.
    const partialLastRow = (options?.truncated ?? false) && !/[\r\n]$/.test(content);
    const quoteChar = this.detectQuoteChar(content);
    const candidates: Candidate[] = [];

    for (const delimiter of DELIMITERS) {
      const candidate = this.evaluate(content, delimiter, quoteChar, partialLastRow);
      if (candidate) candidates.push(candidate);
    }

    let best: Candidate | undefined;
    for (const candidate of candidates) {
      if (
        !best ||
        candidate.width > best.width ||
        (candidate.width === best.width && candidate.strayQuotes < best.strayQuotes)
      ) {
        best = candidate;
      }
    }

    if (!best) {
      throw new DialectDetectionError('no delimiter splits the sample into consistent rows of two or more fields');
    }

    return { delimiter: best.delimiter, quoteChar };
  }

  private toRow(line: ParsedLine, fields: readonly string[], rowNumber: number): CsvRow {
    const values: Record<string, string | undefined> = {};
    fields.forEach((field, index) => {
      values[field] = line.cells[index];
    });

    const [firstError] = line.errors;
    let problem: string | null = null;
    if (firstError !== undefined) {
      problem = firstError;
    } else if (line.cells.length > fields.length) {
      problem = `has ${String(line.cells.length)} fields, expected ${String(fields.length)}`;
    }

    return { kind: 'row', rowNumber, values, problem };
  }

  private evaluate(content: string, delimiter: string, quoteChar: string, partialLastRow: boolean): Candidate | null {
    const result = Papa.parse<string[]>(content, {
      header: false,
      delimiter,
      quoteChar,
      skipEmptyLines: false,
    });

    const malformed = new Set(result.errors.map((e) => e.row));
    const lines = result.data.map((cells, index) => ({ cells, clean: !malformed.has(index) }));
    const rows = (partialLastRow ? lines.slice(0, -1) : lines).filter((line) => !isBlank(line.cells));

    const [header] = rows;
    if (!header?.clean) return null;

    const counts = new Map<number, number>();
    for (const row of rows) {
      if (row.clean) counts.set(row.cells.length, (counts.get(row.cells.length) ?? 0) + 1);
    }

    let width = 0;
    let agreeing = 0;
    for (const [candidateWidth, count] of counts) {
      if (count > agreeing || (count === agreeing && candidateWidth > width)) {
        width = candidateWidth;
        agreeing = count;
      }
    }

    if (width < 2 || header.cells.length !== width) return null;
    if (agreeing / rows.length < CSV_CONSISTENCY_THRESHOLD) return null;

    let strayQuotes = 0;
    for (const row of rows) {
      for (const field of row.cells) {
        if (field.includes(quoteChar)) strayQuotes++;
      }
    }

    return { delimiter, width, strayQuotes };
  }

  private detectQuoteChar(content: string): string {
    for (const quote of QUOTE_CHARS) {
      const quotedField = new RegExp(`(?:^|[,;\\t|])[ ]*${quote}[^${quote}\\n]*${quote}[ ]*(?:[,;\\t|]|$)`, 'm');
      if (quotedField.test(content)) return quote;
    }
    return '"';
  }
}

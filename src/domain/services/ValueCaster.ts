import { ColumnDatatype } from '../model/ColumnDefinition.js';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export type CastResult<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly reason: string };

/** Parse a `YYYY-MM-DD` calendar date into a `Date` at UTC midnight. */
export function castDate(raw: string): CastResult<Date> {
  const match = DATE_PATTERN.exec(raw.trim());
  if (!match) {
    return { ok: false, reason: `'${raw}' does not match YYYY-MM-DD` };
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return { ok: false, reason: `'${raw}' is not a valid calendar date` };
  }

  return { ok: true, value: date };
}

/** Parse decimal text, with an optional sign and exponent, into a finite float. */
export function castNumber(raw: string): CastResult<number> {
  const trimmed = raw.trim();
  const value = DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isFinite(value)) {
    return { ok: false, reason: `'${raw}' is not a number` };
  }
  return { ok: true, value };
}

/** Convert raw cell text according to a column datatype. Text passes through verbatim. */
export function castValue(datatype: ColumnDatatype, raw: string): CastResult<string | number | Date> {
  switch (datatype) {
    case ColumnDatatype.TEXT:
      return { ok: true, value: raw };
    case ColumnDatatype.DATE:
      return castDate(raw);
    case ColumnDatatype.NUMBER:
      return castNumber(raw);
    default: {
      const unreachable: never = datatype;
      return unreachable;
    }
  }
}

/** Format a calendar date back to `YYYY-MM-DD`. */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

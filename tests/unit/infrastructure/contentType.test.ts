import { describe, it, expect } from 'vitest';
import { parseContentType } from '../../../src/infrastructure/http/contentType.js';

describe('parseContentType', () => {
  it('should parse a bare media type', () => {
    expect(parseContentType('text/csv')).toEqual({ essence: 'text/csv', parameters: {} });
  });

  it('should lower-case the essence and parameter names and unquote values', () => {
    expect(parseContentType('Text/CSV; Charset="UTF-8"; header=present')).toEqual({
      essence: 'text/csv',
      parameters: { charset: 'UTF-8', header: 'present' },
    });
  });

  it('should keep the first occurrence of a repeated parameter', () => {
    expect(parseContentType('text/csv; charset=utf-8; charset=latin1')?.parameters).toEqual({ charset: 'utf-8' });
  });

  it('should ignore parameters without a value', () => {
    expect(parseContentType('text/csv; charset')).toEqual({ essence: 'text/csv', parameters: {} });
  });

  it('should return null for a missing or malformed header', () => {
    expect(parseContentType(null)).toBeNull();
    expect(parseContentType('')).toBeNull();
    expect(parseContentType('csv')).toBeNull();
    expect(parseContentType('text/csv/extra')).toBeNull();
    expect(parseContentType('text /csv')).toBeNull();
  });
});

import { describe, it, expect } from 'vitest';
import { createDocumentSchema, findDuplicateColumns, hasIssues } from '../../../src/domain/model/DocumentSchema.js';
import { resolveDatatype } from '../../../src/domain/model/ColumnDefinition.js';
import { column } from '../../helpers/fixtures.js';

describe('DocumentSchema', () => {
  it('should have no issues when the primary key names a column', () => {
    const schema = createDocumentSchema('id', [column('id'), column('name')]);

    expect(schema.issues).toEqual([]);
    expect(hasIssues(schema)).toBe(false);
  });

  it('should record a dangling primary key as an issue', () => {
    const schema = createDocumentSchema('code', [column('id')]);

    expect(schema.issues).toEqual([
      { field: 'code', message: "Primary key 'code' does not reference any column", code: 'PRIMARY_KEY_NOT_FOUND' },
    ]);
    expect(hasIssues(schema)).toBe(true);
  });

  it('should find duplicate column names once each', () => {
    expect(findDuplicateColumns([{ name: 'a' }, { name: 'b' }, { name: 'a' }, { name: 'a' }])).toEqual(['a']);
    expect(findDuplicateColumns([{ name: 'a' }, { name: 'b' }])).toEqual([]);
  });
});

describe('resolveDatatype', () => {
  it('should map the declared datatypes', () => {
    expect(resolveDatatype('string')).toEqual({ datatype: 'text', recognized: true });
    expect(resolveDatatype('date')).toEqual({ datatype: 'date', recognized: true });
    expect(resolveDatatype('number')).toEqual({ datatype: 'number', recognized: true });
  });

  it('should degrade unknown datatypes to text', () => {
    expect(resolveDatatype('integer')).toEqual({ datatype: 'text', recognized: false });
    expect(resolveDatatype('toString')).toEqual({ datatype: 'text', recognized: false });
  });
});

import type { DocumentSchema } from '../model/DocumentSchema.js';
import type { ColumnDefinition } from '../model/ColumnDefinition.js';
import { ColumnDatatype } from '../model/ColumnDefinition.js';

type JsonType = 'string' | 'number';

export interface JsonSchemaProperty {
  readonly type: JsonType | readonly [JsonType, 'null'];
  readonly format?: 'date';
  readonly description?: string;
}

export interface JsonSchemaObject {
  readonly type: 'object';
  readonly properties: Readonly<Record<string, JsonSchemaProperty>>;
  readonly required?: readonly string[];
}

function jsonType(datatype: ColumnDatatype): { type: JsonType; format?: 'date' } {
  switch (datatype) {
    case ColumnDatatype.TEXT:
      return { type: 'string' };
    case ColumnDatatype.DATE:
      return { type: 'string', format: 'date' };
    case ColumnDatatype.NUMBER:
      return { type: 'number' };
    default: {
      const unreachable: never = datatype;
      return unreachable;
    }
  }
}

export function toJsonSchemaProperty(column: ColumnDefinition): JsonSchemaProperty {
  const { type, format } = jsonType(column.datatype);
  return {
    type: column.required ? type : [type, 'null'],
    ...(format ? { format } : {}),
    ...(column.description ? { description: column.description } : {}),
  };
}

/** JSON-schema object describing the records produced for a schema. Optional columns are nullable. */
export function toJsonSchema(schema: DocumentSchema): JsonSchemaObject {
  const properties: Record<string, JsonSchemaProperty> = {};
  for (const column of schema.columns) {
    properties[column.name] = toJsonSchemaProperty(column);
  }

  const required = schema.columns.filter((c) => c.required).map((c) => c.name);

  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

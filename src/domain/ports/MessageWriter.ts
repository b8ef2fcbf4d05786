import type { JsonSchemaObject } from '../services/JsonSchemaBuilder.js';

export interface SchemaMessage {
  readonly type: 'SCHEMA';
  readonly stream: string;
  readonly schema: JsonSchemaObject;
  readonly key_properties: readonly string[];
}

/** A record with dates already rendered as `YYYY-MM-DD`. */
export interface RecordMessage {
  readonly type: 'RECORD';
  readonly stream: string;
  readonly record: Readonly<Record<string, string | number | null>>;
  readonly time_extracted: string;
}

export interface StateMessage {
  readonly type: 'STATE';
  readonly value: {
    readonly bookmarks: Readonly<Record<string, { readonly completed_at: string }>>;
  };
}

export type TapMessage = SchemaMessage | RecordMessage | StateMessage;

/** Sink for tap output messages. */
export interface MessageWriter {
  write(message: TapMessage): void;
}

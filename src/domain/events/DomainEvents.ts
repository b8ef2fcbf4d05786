import type { SchemaIssue } from '../model/DocumentSchema.js';
import type { CsvDialect } from '../model/CsvDialect.js';

/** Emitted when a dataset identifier has been resolved to its metadata. */
export interface DatasetResolvedEvent {
  readonly type: 'dataset:resolved';
  readonly identifier: string;
  readonly title: string;
  readonly timestamp: number;
}

/** Emitted when a stream's schema has been fetched and its name derived. */
export interface SchemaResolvedEvent {
  readonly type: 'schema:resolved';
  readonly identifier: string;
  readonly stream: string;
  readonly columnCount: number;
  readonly primaryKey: string;
  readonly timestamp: number;
}

/** Emitted for each data-quality issue found in a schema document. */
export interface SchemaIssueEvent {
  readonly type: 'schema:issue';
  readonly identifier: string;
  readonly issue: SchemaIssue;
  readonly timestamp: number;
}

/** Emitted once per payload, before the first record. */
export interface DialectDetectedEvent {
  readonly type: 'dialect:detected';
  readonly identifier: string;
  readonly dialect: CsvDialect;
  readonly timestamp: number;
}

/** Emitted for each row dropped under the `skip` row error policy. */
export interface RowSkippedEvent {
  readonly type: 'row:skipped';
  readonly identifier: string;
  readonly row: number;
  readonly column: string | null;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a stream has been fully synced. */
export interface StreamCompletedEvent {
  readonly type: 'stream:completed';
  readonly identifier: string;
  readonly stream: string;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted when a stream fails. The error still propagates to the caller. */
export interface StreamFailedEvent {
  readonly type: 'stream:failed';
  readonly identifier: string;
  readonly error: string;
  readonly code?: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | DatasetResolvedEvent
  | SchemaResolvedEvent
  | SchemaIssueEvent
  | DialectDetectedEvent
  | RowSkippedEvent
  | StreamCompletedEvent
  | StreamFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

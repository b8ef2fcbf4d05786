import type { Logger } from 'pino';
import type { StreamFactory } from './StreamFactory.js';
import type { EventBus } from './EventBus.js';

/**
 * State shared by the tap's use cases for one run.
 *
 * Internal: not exported from the public API.
 */
export interface TapContext {
  readonly identifiers: readonly string[];
  readonly factory: StreamFactory;
  readonly eventBus: EventBus;
  readonly logger: Logger;
  /** Clock used for `time_extracted` and bookmarks. */
  readonly now: () => Date;
}

import type { MessageWriter, TapMessage, RecordMessage, SchemaMessage, StateMessage } from '../../domain/ports/MessageWriter.js';

/** Collects messages in memory. Useful for embedding the tap and for tests. */
export class InMemoryMessageWriter implements MessageWriter {
  private readonly messages: TapMessage[] = [];

  write(message: TapMessage): void {
    this.messages.push(message);
  }

  all(): readonly TapMessage[] {
    return [...this.messages];
  }

  schemas(): SchemaMessage[] {
    return this.messages.filter((m): m is SchemaMessage => m.type === 'SCHEMA');
  }

  records(stream?: string): RecordMessage[] {
    return this.messages.filter(
      (m): m is RecordMessage => m.type === 'RECORD' && (stream === undefined || m.stream === stream),
    );
  }

  states(): StateMessage[] {
    return this.messages.filter((m): m is StateMessage => m.type === 'STATE');
  }
}

import type { MessageWriter, TapMessage } from '../../domain/ports/MessageWriter.js';

export interface TextSink {
  write(chunk: string): unknown;
}

/** Writes each message as one line of JSON. Defaults to stdout. */
export class JsonLinesWriter implements MessageWriter {
  constructor(private readonly sink: TextSink = process.stdout) {}

  write(message: TapMessage): void {
    this.sink.write(`${JSON.stringify(message)}\n`);
  }
}

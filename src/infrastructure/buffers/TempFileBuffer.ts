import { createReadStream } from 'node:fs';
import type { ReadStream } from 'node:fs';
import { mkdtemp, open, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Payload held in a private temporary directory for the duration of one stream.
 *
 * Callers must `release()` it on every exit path; releasing twice is a no-op.
 */
export class TempFileBuffer {
  private released = false;

  private constructor(
    private readonly directory: string,
    readonly path: string,
  ) {}

  static async create(prefix = 'opendata-tap-'): Promise<TempFileBuffer> {
    const directory = await mkdtemp(join(tmpdir(), prefix));
    return new TempFileBuffer(directory, join(directory, 'payload.csv'));
  }

  /** Write the payload as UTF-8. Returns its size in bytes. */
  async write(text: string): Promise<number> {
    this.assertNotReleased();
    const bytes = Buffer.from(text, 'utf-8');
    await writeFile(this.path, bytes);
    return bytes.length;
  }

  /** Read at most `maxBytes` from the start of the payload. */
  async sample(maxBytes: number): Promise<string> {
    this.assertNotReleased();
    const handle = await open(this.path, 'r');
    try {
      const buffer = Buffer.alloc(maxBytes);
      const { bytesRead } = await handle.read(buffer, 0, maxBytes, 0);
      return buffer.subarray(0, bytesRead).toString('utf-8');
    } finally {
      await handle.close();
    }
  }

  /** Open the payload as a stream of UTF-8 text chunks. */
  stream(): ReadStream {
    this.assertNotReleased();
    return createReadStream(this.path, { encoding: 'utf-8', highWaterMark: 65536 });
  }

  get isReleased(): boolean {
    return this.released;
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await rm(this.directory, { recursive: true, force: true });
  }

  private assertNotReleased(): void {
    if (this.released) {
      throw new Error(`TempFileBuffer: ${this.path} has already been released`);
    }
  }
}

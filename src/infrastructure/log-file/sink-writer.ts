import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { RecordSink } from '../../application/consumer-loop.js';

/**
 * Append-mode UTF-8 file owned by a single consumer run.
 *
 * `write()` buffers; `flush()` hands the buffer to the OS. The buffer is
 * cleared before the write is attempted, so a failed flush never
 * duplicates text on the next one. No fsync.
 */
export class SinkWriter implements RecordSink {
  private buffer = '';
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly handle: FileHandle,
  ) {}

  /** Opens (or creates) `path` for appending. */
  static async open(path: string): Promise<SinkWriter> {
    const handle = await open(path, 'a');
    return new SinkWriter(path, handle);
  }

  write(text: string): void {
    if (this.closed) throw new Error(`Sink already closed: ${this.path}`);
    this.buffer += text;
  }

  async flush(): Promise<void> {
    if (this.buffer === '') return;
    const text = this.buffer;
    this.buffer = '';
    await this.handle.appendFile(text, 'utf8');
  }

  /** Flushes what is left and releases the handle, even if the flush fails. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.flush();
    } finally {
      await this.handle.close();
    }
  }
}

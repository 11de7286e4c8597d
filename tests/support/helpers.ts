import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { RenderableEvent } from '../../src/domain/index.js';
import type { RecordSink } from '../../src/application/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

export interface StepEvent extends RenderableEvent {
  readonly kind: 'Step';
  readonly n: number;
}

/** Generic-path event used where the payload does not matter. */
export function step(n: number): StepEvent {
  return { kind: 'Step', n };
}

/** Fixed local-time clock: 2026-03-01 09:05:07.042. */
export const FIXED_DATE = new Date(2026, 2, 1, 9, 5, 7, 42);

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * In-memory RecordSink. Each non-empty flush appends one chunk.
 * `failFlushes` makes that many upcoming flushes reject (dropping their text).
 */
export class MemorySink implements RecordSink {
  readonly chunks: string[] = [];
  closed = false;
  closeCalls = 0;
  failFlushes = 0;
  private buffer = '';

  constructor(readonly path: string = '/logs/test.log') {}

  get text(): string {
    return this.chunks.join('');
  }

  write(text: string): void {
    this.buffer += text;
  }

  async flush(): Promise<void> {
    const text = this.buffer;
    this.buffer = '';
    if (this.failFlushes > 0) {
      this.failFlushes--;
      throw new Error('disk full');
    }
    if (text !== '') this.chunks.push(text);
  }

  async close(): Promise<void> {
    this.closeCalls++;
    await this.flush();
    this.closed = true;
  }
}

export interface Gate {
  readonly opened: Promise<void>;
  open(): void;
}

/** Promise that stays pending until `open()` is called. */
export function createGate(): Gate {
  let release: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { opened, open: () => release() };
}

/** MemorySink whose flushes and/or close wait on gates. */
export class GatedSink extends MemorySink {
  constructor(
    path: string,
    private readonly flushGate: Gate | undefined,
    private readonly closeGate: Gate | undefined = undefined,
  ) {
    super(path);
  }

  override async flush(): Promise<void> {
    if (this.flushGate) await this.flushGate.opened;
    await super.flush();
  }

  override async close(): Promise<void> {
    this.closeCalls++;
    if (this.closeGate) await this.closeGate.opened;
    await super.flush();
    this.closed = true;
  }
}

import type { Logger } from 'pino';
import type { TimestampedEvent } from '../domain/index.js';
import type { BoundedQueue } from './event-queue.js';
import { NO_DATA } from './event-queue.js';
import { formatRecord, stackTraceOf } from './formatter.js';

/** Append-only text destination owned by one consumer run. */
export interface RecordSink {
  readonly path: string;
  write(text: string): void;
  flush(): Promise<void>;
  close(): Promise<void>;
}

/** Dependencies bundled for one consumer run. */
export interface ConsumerLoopDeps {
  queue: BoundedQueue<TimestampedEvent>;
  openSink: () => Promise<RecordSink>;
  pollTimeoutMs: number;
  log: Logger;
  format?: ((entry: TimestampedEvent) => string) | undefined;
  onRecordWritten?: (() => void) | undefined;
}

export interface ConsumerRunSummary {
  readonly file: string;
  readonly written: number;
  readonly failed: number;
}

/**
 * One consumer run.
 *
 * 1. Open the sink (append mode).
 * 2. Poll the queue; format and write each event, flushing after every record.
 * 3. Retire when a poll times out with no data.
 *
 * The sink is closed on every exit path. A record that fails to format or
 * write is replaced by the failure's trace and the loop moves on; only a
 * failure to open or close the sink rejects.
 */
export async function runConsumerLoop(deps: ConsumerLoopDeps): Promise<ConsumerRunSummary> {
  const format = deps.format ?? formatRecord;
  const sink = await deps.openSink();
  let written = 0;
  let failed = 0;

  deps.log.debug({ file: sink.path }, 'Resolver log consumer started');

  try {
    for (;;) {
      const entry = await deps.queue.poll(deps.pollTimeoutMs);
      if (entry === NO_DATA) break;

      if (await writeRecord(sink, format, entry, deps.log)) {
        written++;
        deps.onRecordWritten?.();
      } else {
        failed++;
      }
    }
  } finally {
    await sink.close();
  }

  deps.log.debug({ file: sink.path, written, failed }, 'Resolver log consumer retired');
  return { file: sink.path, written, failed };
}

async function writeRecord(
  sink: RecordSink,
  format: (entry: TimestampedEvent) => string,
  entry: TimestampedEvent,
  log: Logger,
): Promise<boolean> {
  try {
    sink.write(format(entry));
    await sink.flush();
    return true;
  } catch (err: unknown) {
    log.warn({ err, kind: entry.event.kind }, 'Failed to render resolver event');
    await writeDiagnostics(sink, err, log);
    return false;
  }
}

/** Best-effort: the failure's trace goes into the record's place. */
async function writeDiagnostics(sink: RecordSink, failure: unknown, log: Logger): Promise<void> {
  try {
    sink.write(`${stackTraceOf(failure)}\n\n`);
    await sink.flush();
  } catch (err: unknown) {
    log.warn({ err }, 'Failed to write resolver event diagnostics');
  }
}

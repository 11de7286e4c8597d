import { join } from 'node:path';
import pino from 'pino';
import type { Logger } from 'pino';
import type { ResolverEvent, TimestampedEvent } from './domain/index.js';
import type { RecordSink } from './application/consumer-loop.js';
import type { ResolverLoggerOptions, ResolverLoggerOptionsInput } from './application/options.js';
import { BoundedQueue } from './application/event-queue.js';
import { runConsumerLoop } from './application/consumer-loop.js';
import { parseResolverLoggerOptions } from './application/options.js';
import { defaultLogDirectory, logFileName, openLogFile } from './infrastructure/log-file/index.js';

/** Collaborators that are not plain options. */
export interface ResolverEventLoggerDeps {
  /** Internal diagnostics; silent by default. */
  log?: Logger | undefined;
  /** Clock for submission timestamps and the log file name. */
  now?: (() => Date) | undefined;
  /** Resolves the platform log directory when `logDir` is not set. */
  logDirectory?: (() => string) | undefined;
  /** Opens the append-mode sink for one consumer run. */
  openSink?: ((path: string) => Promise<RecordSink>) | undefined;
}

export interface ResolverEventLoggerStats {
  submitted: number;
  dropped: number;
  written: number;
  consumerStarts: number;
}

/**
 * Best-effort asynchronous event log.
 *
 * `log()` timestamps the event, offers it to a bounded queue and makes sure
 * exactly one consumer is draining that queue. The consumer is started on
 * demand and retires itself after `pollTimeoutMs` without events; the next
 * `log()` starts a fresh one that appends to the same file.
 *
 * Nothing here ever throws back to a producer. Events that find the queue
 * full for longer than `offerTimeoutMs` are dropped.
 */
export class ResolverEventLogger {
  private readonly options: ResolverLoggerOptions;
  private readonly queue: BoundedQueue<TimestampedEvent>;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly logDirectory: () => string;
  private readonly openSink: (path: string) => Promise<RecordSink>;

  /** The live consumer run, if any. Checked and set without yielding. */
  private consumer: Promise<void> | undefined;
  private file: string | undefined;

  private readonly counters: ResolverEventLoggerStats = {
    submitted: 0,
    dropped: 0,
    written: 0,
    consumerStarts: 0,
  };

  constructor(options: ResolverLoggerOptionsInput = {}, deps: ResolverEventLoggerDeps = {}) {
    this.options = parseResolverLoggerOptions(options);
    this.queue = new BoundedQueue<TimestampedEvent>(this.options.capacity);
    this.logger = deps.log ?? pino({ name: 'script-resolver-log', level: 'silent' });
    this.now = deps.now ?? (() => new Date());
    this.logDirectory = deps.logDirectory ?? (() => defaultLogDirectory());
    this.openSink = deps.openSink ?? openLogFile;
  }

  /** Fire-and-forget. Never throws, never waits. */
  log(event: ResolverEvent): void {
    try {
      this.counters.submitted++;
      const entry: TimestampedEvent = { timestamp: this.now(), event };
      void this.submit(entry).catch((err: unknown) => {
        this.logger.warn({ err }, 'Failed to submit resolver event');
      });
      this.ensureAliveConsumer();
    } catch (err: unknown) {
      this.logger.warn({ err }, 'Failed to submit resolver event');
    }
  }

  /** Path of the log file, fixed when the first consumer starts. */
  get outputFile(): string | undefined {
    return this.file;
  }

  /** True while a consumer run is live. */
  get consumerAlive(): boolean {
    return this.consumer !== undefined;
  }

  stats(): ResolverEventLoggerStats {
    return { ...this.counters };
  }

  /**
   * Resolves once no consumer is live, following any restart caused by
   * events that arrived while the previous consumer was closing.
   */
  async whenIdle(): Promise<void> {
    while (this.consumer !== undefined) {
      await this.consumer;
    }
  }

  // The offer's synchronous part runs before this returns, keeping
  // queue order equal to call order.
  private async submit(entry: TimestampedEvent): Promise<void> {
    const accepted = await this.queue.offer(entry, this.options.offerTimeoutMs);
    if (accepted) return;
    this.counters.dropped++;
    this.logger.debug({ kind: entry.event.kind }, 'Resolver event dropped');
  }

  private ensureAliveConsumer(): void {
    if (this.consumer !== undefined) return;

    this.counters.consumerStarts++;
    const run: Promise<void> = this.runConsumer().then(
      () => this.retire(run, true),
      (err: unknown) => {
        this.logger.warn({ err, file: this.file }, 'Resolver log consumer failed');
        // No immediate restart: the next log() call retries.
        this.retire(run, false);
      },
    );
    this.consumer = run;
  }

  private async runConsumer(): Promise<void> {
    const file = this.resolveOutputFile();
    await runConsumerLoop({
      queue: this.queue,
      openSink: () => this.openSink(file),
      pollTimeoutMs: this.options.pollTimeoutMs,
      log: this.logger,
      onRecordWritten: () => {
        this.counters.written++;
      },
    });
  }

  private retire(run: Promise<void>, restartIfPending: boolean): void {
    if (this.consumer === run) this.consumer = undefined;
    // Events offered after the last poll timed out but before the
    // handle was cleared would otherwise wait for the next log() call.
    if (restartIfPending && this.queue.size > 0) this.ensureAliveConsumer();
  }

  private resolveOutputFile(): string {
    if (this.file === undefined) {
      const dir = this.options.logDir ?? this.logDirectory();
      this.file = join(dir, logFileName(this.now()));
    }
    return this.file;
  }
}

let shared: ResolverEventLogger | undefined;

/** Process-wide instance with default options, created on first use. */
export function getSharedResolverEventLogger(): ResolverEventLogger {
  shared ??= new ResolverEventLogger();
  return shared;
}

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ZodError } from 'zod';
import {
  ResolverEventLogger,
  getSharedResolverEventLogger,
} from '../src/resolver-event-logger.js';
import { formatRecord } from '../src/application/formatter.js';
import { formatTimestamp } from '../src/application/timestamps.js';
import { logFileName } from '../src/infrastructure/log-file/log-location.js';
import type { RenderableEvent } from '../src/domain/index.js';
import {
  FIXED_DATE,
  GatedSink,
  MemorySink,
  createGate,
  fakeLogger,
  sleep,
  step,
} from './support/helpers.js';

const TS = formatTimestamp(FIXED_DATE);

function stepRecord(n: number): string {
  return `${TS} - Step(\n\tn = ${n})\n\n`;
}

describe('ResolverEventLogger', () => {
  let log: ReturnType<typeof fakeLogger>;
  let sinks: MemorySink[];
  let openSink: Mock<(path: string) => Promise<MemorySink>>;

  function createLogger() {
    return new ResolverEventLogger(
      { pollTimeoutMs: 20, logDir: '/logs' },
      { log, now: () => FIXED_DATE, openSink },
    );
  }

  beforeEach(() => {
    log = fakeLogger();
    sinks = [];
    openSink = vi.fn(async (path: string) => {
      const sink = new MemorySink(path);
      sinks.push(sink);
      return sink;
    });
  });

  it('writes one record per event in submission order', async () => {
    const logger = createLogger();

    logger.log(step(1));
    logger.log(step(2));
    logger.log(step(3));
    await logger.whenIdle();

    expect(sinks).toHaveLength(1);
    expect(sinks[0]?.text).toBe(stepRecord(1) + stepRecord(2) + stepRecord(3));
    expect(sinks[0]?.closed).toBe(true);
    expect(logger.stats()).toEqual({ submitted: 3, dropped: 0, written: 3, consumerStarts: 1 });
  });

  it('names the log file after its creation time inside the log directory', async () => {
    const logger = createLogger();
    expect(logger.outputFile).toBeUndefined();

    logger.log(step(1));
    await logger.whenIdle();

    const expected = join('/logs', logFileName(FIXED_DATE));
    expect(logger.outputFile).toBe(expected);
    expect(openSink).toHaveBeenCalledWith(expected);
  });

  it('resolves the platform directory when no logDir is set', async () => {
    const logDirectory = vi.fn(() => '/platform/logs');
    const logger = new ResolverEventLogger(
      { pollTimeoutMs: 20 },
      { log, now: () => FIXED_DATE, openSink, logDirectory },
    );

    logger.log(step(1));
    await logger.whenIdle();

    expect(logDirectory).toHaveBeenCalledTimes(1);
    expect(logger.outputFile).toBe(join('/platform/logs', logFileName(FIXED_DATE)));
  });

  it('returns from log() without waiting for the write', () => {
    const logger = createLogger();

    expect(logger.log(step(1))).toBeUndefined();
    expect(logger.consumerAlive).toBe(true);
    expect(logger.stats().written).toBe(0);
  });

  it('starts exactly one consumer for many concurrent producers', async () => {
    const logger = createLogger();

    await Promise.all(
      Array.from({ length: 50 }, async (_, i) => {
        await Promise.resolve();
        logger.log(step(i));
      }),
    );
    await logger.whenIdle();

    expect(logger.stats().consumerStarts).toBe(1);
    expect(openSink).toHaveBeenCalledTimes(1);
    expect(logger.stats().written).toBe(50);
  });

  it('retires after the idle period and starts a fresh consumer on the next event', async () => {
    const logger = createLogger();

    logger.log(step(1));
    await logger.whenIdle();
    expect(logger.consumerAlive).toBe(false);

    logger.log(step(2));
    await logger.whenIdle();

    expect(logger.stats().consumerStarts).toBe(2);
    expect(openSink).toHaveBeenCalledTimes(2);
    expect(openSink.mock.calls[0]?.[0]).toBe(openSink.mock.calls[1]?.[0]);
    expect(sinks[0]?.text).toBe(stepRecord(1));
    expect(sinks[1]?.text).toBe(stepRecord(2));
  });

  it('drops events that find the queue full past the offer timeout', async () => {
    const gate = createGate();
    const gatedSinks: GatedSink[] = [];
    const logger = new ResolverEventLogger(
      { capacity: 64, offerTimeoutMs: 10, pollTimeoutMs: 20, logDir: '/logs' },
      {
        log,
        now: () => FIXED_DATE,
        openSink: async (path) => {
          const sink = new GatedSink(path, gate);
          gatedSinks.push(sink);
          return sink;
        },
      },
    );

    const started = Date.now();
    for (let n = 1; n <= 100; n++) logger.log(step(n));
    expect(Date.now() - started).toBeLessThan(50);

    // One record is stuck in flush, 64 fill the queue, one waiting
    // offer was admitted when the first was taken; the rest expire.
    await sleep(40);
    expect(logger.stats().dropped).toBe(35);
    expect(log.debug).toHaveBeenCalledWith({ kind: 'Step' }, 'Resolver event dropped');

    gate.open();
    await logger.whenIdle();

    expect(logger.stats()).toEqual({ submitted: 100, dropped: 35, written: 65, consumerStarts: 1 });
    const expected = Array.from({ length: 65 }, (_, i) => stepRecord(i + 1)).join('');
    expect(gatedSinks[0]?.text).toBe(expected);
  });

  it('keeps writing after one event fails to render', async () => {
    const logger = createLogger();
    const failure = new Error('no fields');
    failure.stack = 'Error: no fields\n    at fields (e.ts:1:1)';
    const broken: RenderableEvent = {
      kind: 'Broken',
      fields: () => {
        throw failure;
      },
    };

    logger.log(step(1));
    logger.log(broken);
    logger.log(step(3));
    await logger.whenIdle();

    expect(sinks[0]?.text).toBe(
      stepRecord(1) + 'Error: no fields\n    at fields (e.ts:1:1)\n\n' + stepRecord(3),
    );
    expect(logger.stats().written).toBe(2);
  });

  it('retries a failed consumer start on the next log() call', async () => {
    openSink.mockRejectedValueOnce(new Error('EACCES: permission denied'));
    const logger = createLogger();

    logger.log(step(1));
    await logger.whenIdle();

    expect(logger.consumerAlive).toBe(false);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Resolver log consumer failed',
    );

    logger.log(step(2));
    await logger.whenIdle();

    expect(logger.stats().consumerStarts).toBe(2);
    expect(sinks).toHaveLength(1);
    expect(sinks[0]?.text).toBe(stepRecord(1) + stepRecord(2));
  });

  it('restarts when an event arrives while the retiring consumer is closing', async () => {
    const closeGate = createGate();
    const gatedSinks: GatedSink[] = [];
    const logger = new ResolverEventLogger(
      { pollTimeoutMs: 20, logDir: '/logs' },
      {
        log,
        now: () => FIXED_DATE,
        openSink: async (path) => {
          const sink = new GatedSink(path, undefined, gatedSinks.length === 0 ? closeGate : undefined);
          gatedSinks.push(sink);
          return sink;
        },
      },
    );

    logger.log(step(1));
    await vi.waitFor(() => expect(gatedSinks[0]?.closeCalls).toBe(1));

    logger.log(step(2));
    expect(logger.stats().consumerStarts).toBe(1);

    closeGate.open();
    await logger.whenIdle();

    expect(logger.stats().consumerStarts).toBe(2);
    expect(gatedSinks[0]?.text).toBe(stepRecord(1));
    expect(gatedSinks[1]?.text).toBe(stepRecord(2));
  });

  it('never throws to the producer', () => {
    const logger = new ResolverEventLogger(
      { logDir: '/logs' },
      {
        log,
        now: () => {
          throw new Error('clock failure');
        },
        openSink,
      },
    );

    expect(() => logger.log(step(1))).not.toThrow();
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Failed to submit resolver event',
    );
    expect(logger.consumerAlive).toBe(false);
  });

  it('rejects invalid options at construction', () => {
    expect(() => new ResolverEventLogger({ capacity: 0 })).toThrow(ZodError);
    expect(() => new ResolverEventLogger({ offerTimeoutMs: -5 })).toThrow(ZodError);
  });
});

describe('ResolverEventLogger with a real log file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'resolver-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates the directory and appends across consumer runs', async () => {
    const logDir = join(dir, 'nested', 'logs');
    const logger = new ResolverEventLogger(
      { pollTimeoutMs: 20, logDir },
      { log: fakeLogger(), now: () => FIXED_DATE },
    );

    logger.log(step(1));
    await logger.whenIdle();
    logger.log(step(2));
    await logger.whenIdle();

    const file = join(logDir, logFileName(FIXED_DATE));
    expect(logger.outputFile).toBe(file);
    expect(await readFile(file, 'utf-8')).toBe(
      formatRecord({ timestamp: FIXED_DATE, event: step(1) }) +
        formatRecord({ timestamp: FIXED_DATE, event: step(2) }),
    );
  });
});

describe('getSharedResolverEventLogger', () => {
  it('returns the same instance every time', () => {
    expect(getSharedResolverEventLogger()).toBe(getSharedResolverEventLogger());
  });
});

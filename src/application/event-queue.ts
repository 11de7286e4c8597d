/** Returned by `poll()` when the timeout elapses with the queue empty. */
export const NO_DATA: unique symbol = Symbol('NO_DATA');

export type PollResult<T> = T | typeof NO_DATA;

interface PendingOffer<T> {
  readonly item: T;
  readonly resolve: (accepted: boolean) => void;
  readonly timer: NodeJS.Timeout;
}

interface PendingPoll<T> {
  readonly resolve: (result: PollResult<T>) => void;
  readonly timer: NodeJS.Timeout;
}

/**
 * Bounded FIFO hand-off between many producers and one consumer.
 *
 * `offer()` stores the item synchronously when there is room, so the
 * order of calls is the order of items. When the buffer is full the
 * offer waits in line for at most `timeoutMs` and then gives up.
 * `poll()` waits at most `timeoutMs` for an item and resolves `NO_DATA`
 * otherwise.
 *
 * Timers are unref'd: a waiting queue never keeps the process alive.
 */
export class BoundedQueue<T> {
  // Boxed so that `T` may itself include `undefined`.
  private readonly items: Array<{ readonly value: T }> = [];
  private readonly offers: PendingOffer<T>[] = [];
  private readonly polls: PendingPoll<T>[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Items currently buffered (offers still waiting are not counted). */
  get size(): number {
    return this.items.length;
  }

  offer(item: T, timeoutMs: number): Promise<boolean> {
    const waiting = this.polls.shift();
    if (waiting) {
      clearTimeout(waiting.timer);
      waiting.resolve(item);
      return Promise.resolve(true);
    }

    if (this.offers.length === 0 && this.items.length < this.capacity) {
      this.items.push({ value: item });
      return Promise.resolve(true);
    }

    if (timeoutMs <= 0) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const pending: PendingOffer<T> = {
        item,
        resolve,
        timer: setTimeout(() => {
          removeFrom(this.offers, pending);
          resolve(false);
        }, timeoutMs).unref(),
      };
      this.offers.push(pending);
    });
  }

  poll(timeoutMs: number): Promise<PollResult<T>> {
    const head = this.items.shift();
    if (head) {
      this.admitWaitingOffer();
      return Promise.resolve(head.value);
    }

    return new Promise<PollResult<T>>((resolve) => {
      const pending: PendingPoll<T> = {
        resolve,
        timer: setTimeout(() => {
          removeFrom(this.polls, pending);
          resolve(NO_DATA);
        }, timeoutMs).unref(),
      };
      this.polls.push(pending);
    });
  }

  private admitWaitingOffer(): void {
    const next = this.offers.shift();
    if (!next) return;
    clearTimeout(next.timer);
    this.items.push({ value: next.item });
    next.resolve(true);
  }
}

function removeFrom<E>(list: E[], entry: E): void {
  const index = list.indexOf(entry);
  if (index !== -1) list.splice(index, 1);
}

import {
  Batch,
  CapturedRecord,
  PollableSource,
  PollResult,
  Timestamped,
  Waker,
} from '@chronomerge/core';

export interface AsyncIterableSourceOptions {
  name?: string;
}

/**
 * Exposes an async iterable of batches as a non-blocking pollable source.
 *
 * A poll never waits: it hands out a pull that has already settled, or starts
 * one and answers `pending`, waking the most recent waker once it settles.
 */
export class AsyncIterableSource<R extends Timestamped = CapturedRecord>
  implements PollableSource<R>
{
  readonly name?: string;
  private iterator?: AsyncIterator<Batch<R>>;
  private inFlight = false;
  private settled?: PollResult<Batch<R>>;
  private waker?: Waker;
  private finished = false;

  constructor(private iterable: AsyncIterable<Batch<R>>, options: AsyncIterableSourceOptions = {}) {
    this.name = options.name;
  }

  poll(waker: Waker): PollResult<Batch<R>> {
    if (this.settled) {
      const result = this.settled;
      if (result.kind === 'ready') {
        this.settled = undefined;
      }
      return result;
    }

    this.waker = waker;
    if (!this.inFlight && !this.finished) {
      this.pull();
    }
    return { kind: 'pending' };
  }

  async close(): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    this.settled = { kind: 'done' };

    const iterator = this.iterator;
    if (iterator?.return) {
      try {
        await iterator.return();
      } catch (error) {
        console.error(`Failed to close source ${this.name ?? '(unnamed)'}:`, error);
      }
    }
  }

  private pull(): void {
    if (!this.iterator) {
      this.iterator = this.iterable[Symbol.asyncIterator]();
    }

    this.inFlight = true;
    void this.iterator.next().then(
      next => {
        this.settle(next.done ? { kind: 'done' } : { kind: 'ready', value: next.value });
      },
      (error: unknown) => {
        this.settle({
          kind: 'error',
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    );
  }

  private settle(result: PollResult<Batch<R>>): void {
    this.inFlight = false;
    if (this.finished) return;
    if (result.kind !== 'ready') {
      this.finished = true;
    }
    this.settled = result;

    const waker = this.waker;
    this.waker = undefined;
    waker?.wake();
  }
}

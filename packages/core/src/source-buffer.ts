import { Batch, MergeError, Timestamped } from './types';

/**
 * Unreleased batches of one source plus its completion flag.
 * Batches are assumed to arrive in non-decreasing timestamp order.
 */
export class SourceBuffer<R extends Timestamped> {
  private batches: Batch<R>[] = [];
  private complete = false;

  constructor(readonly index: number, readonly name?: string) {}

  accept(batch: Batch<R>): void {
    if (this.complete) {
      throw new MergeError(
        `Source ${this.describe()} delivered data after completing`,
        'SOURCE_ALREADY_COMPLETE',
        { index: this.index, name: this.name }
      );
    }
    if (batch.length === 0) return;
    this.batches.push(batch);
  }

  markComplete(): void {
    this.complete = true;
  }

  isComplete(): boolean {
    return this.complete;
  }

  isExhausted(): boolean {
    return this.complete && this.batches.length === 0;
  }

  /** Watermark: the newest timestamp this source has produced so far. */
  latestTimestamp(): number | undefined {
    const last = this.batches[this.batches.length - 1];
    return last?.[last.length - 1]?.timestamp;
  }

  earliestTimestamp(): number | undefined {
    return this.batches[0]?.[0]?.timestamp;
  }

  span(): number {
    const earliest = this.earliestTimestamp();
    const latest = this.latestTimestamp();
    if (earliest === undefined || latest === undefined) return 0;
    return Math.max(0, latest - earliest);
  }

  releaseUpTo(horizon: number): R[] {
    const released: R[] = [];
    const kept: R[] = [];

    for (const batch of this.batches) {
      for (const record of batch) {
        if (record.timestamp <= horizon) {
          released.push(record);
        } else {
          kept.push(record);
        }
      }
    }

    this.batches = kept.length > 0 ? [kept] : [];
    return released;
  }

  /** Removes everything buffered regardless of horizon. */
  drain(): R[] {
    const all: R[] = [];
    for (const batch of this.batches) {
      all.push(...batch);
    }
    this.batches = [];
    return all;
  }

  clear(): number {
    const dropped = this.bufferedRecordCount();
    this.batches = [];
    return dropped;
  }

  bufferedBatchCount(): number {
    return this.batches.length;
  }

  bufferedRecordCount(): number {
    let count = 0;
    for (const batch of this.batches) {
      count += batch.length;
    }
    return count;
  }

  describe(): string {
    return this.name ? `"${this.name}" (#${this.index})` : `#${this.index}`;
  }
}

import { EventEmitter } from 'eventemitter3';
import {
  Batch,
  CapturedRecord,
  done,
  failed,
  MergeError,
  MergerEvents,
  MergerOptions,
  MergerState,
  PollableSource,
  PollResult,
  ready,
  Timestamped,
  Waker,
} from './types';
import { SourceBuffer } from './source-buffer';
import { gatherAll, gatherReleasable } from './watermark';
import { decideTick, isFlushDue, SourceTick, summarizeTick } from './backpressure';
import { resolveBufferSpan } from './utils';

interface SourceSlot<R extends Timestamped> {
  source: PollableSource<R>;
  buffer: SourceBuffer<R>;
}

/**
 * Merges independently produced, internally time-ordered sources into one
 * time-ordered sequence of batches.
 *
 * Records are released up to the lowest watermark across sources once every
 * source has settled. If any source's buffered window grows past
 * `maxBufferSpan`, the merger flushes anyway and a straggler's later data may
 * come out behind an earlier horizon.
 *
 * The merger is itself a {@link PollableSource}, so mergers can be nested.
 * @fires BoundedMerger#flush
 * @fires BoundedMerger#outOfOrder
 * @fires BoundedMerger#sourceCompleted
 * @fires BoundedMerger#sourceError
 * @fires BoundedMerger#stalled
 * @fires BoundedMerger#finished
 * @example
 * ```typescript
 * const merger = new BoundedMerger([left, right], { maxBufferSpan: '250ms' });
 * for await (const batch of iterateSource(merger)) {
 *   write(batch);
 * }
 * ```
 */
export class BoundedMerger<R extends Timestamped = CapturedRecord>
  extends EventEmitter<MergerEvents>
  implements PollableSource<R>
{
  readonly name?: string;
  private readonly sources: readonly PollableSource<R>[];
  private slots: SourceSlot<R>[];
  private options: { maxBufferSpan: number; flushOnError: boolean };
  private deferredError?: Error;
  private lastHorizon?: number;
  private finished = false;
  private closed = false;

  constructor(sources: readonly PollableSource<R>[], options: MergerOptions = {}, name?: string) {
    super();

    if (sources.length === 0) {
      throw new MergeError('At least one source is required', 'NO_SOURCES');
    }

    const seen = new Set<PollableSource<R>>();
    sources.forEach((source, index) => {
      if (seen.has(source)) {
        throw new MergeError(
          `Source ${source.name ?? `#${index}`} was passed more than once`,
          'DUPLICATE_SOURCE',
          { index, name: source.name }
        );
      }
      seen.add(source);
    });

    this.name = name;
    this.sources = [...sources];
    this.options = {
      maxBufferSpan: resolveBufferSpan(options.maxBufferSpan ?? '100ms'),
      flushOnError: options.flushOnError ?? false,
    };
    this.slots = sources.map((source, index) => ({
      source,
      buffer: new SourceBuffer<R>(index, source.name),
    }));
  }

  getMaxBufferSpan(): number {
    return this.options.maxBufferSpan;
  }

  getState(): MergerState {
    if (this.finished) return 'finished';
    if (this.slots.length === 0) {
      return this.deferredError ? 'draining' : 'finished';
    }
    return this.slots.every(slot => slot.buffer.isComplete()) ? 'draining' : 'active';
  }

  /** Number of records buffered and not yet released. */
  bufferedRecordCount(): number {
    let count = 0;
    for (const slot of this.slots) {
      count += slot.buffer.bufferedRecordCount();
    }
    return count;
  }

  poll(waker: Waker): PollResult<Batch<R>> {
    if (this.deferredError) {
      const error = this.deferredError;
      this.deferredError = undefined;
      this.finish();
      return failed(error);
    }
    if (this.finished) {
      return done();
    }

    const ticks: SourceTick<R>[] = [];

    for (const { source, buffer } of this.slots) {
      if (buffer.isComplete()) {
        ticks.push({ buffer, stalled: true });
        continue;
      }

      const result = source.poll(waker);
      let stalled = false;
      switch (result.kind) {
        case 'pending':
          stalled = true;
          break;
        case 'error':
          return this.failWith(buffer, result.error);
        case 'done':
          buffer.markComplete();
          this.emit('sourceCompleted', { index: buffer.index, name: buffer.name });
          break;
        case 'ready':
          if (result.value.length === 0) {
            stalled = true;
          } else {
            buffer.accept(result.value);
          }
          break;
      }
      ticks.push({ buffer, stalled });
    }

    const decision = isFlushDue(summarizeTick(ticks), this.options.maxBufferSpan);

    let produced: R[] = [];
    if (decision.flush) {
      const release = gatherReleasable(ticks.map(tick => tick.buffer));
      produced = release.records;
      if (release.horizon !== undefined) {
        this.recordFlush(release.horizon, produced, decision.forced);
      }
    }

    const remaining = ticks.filter(tick => !tick.buffer.isExhausted());
    this.slots = this.slots.filter(slot => !slot.buffer.isExhausted());

    const answer = decideTick(produced, summarizeTick(remaining));
    if (answer.kind === 'done') {
      this.finish();
    } else if (answer.kind === 'pending') {
      this.emit('stalled', { remaining: this.slots.length });
    } else if (produced.length === 0) {
      // Data arrived but nothing was released. A parent merger counts an
      // empty batch as stalled, so it must hear about the arrival.
      waker.wake();
    }
    return answer;
  }

  /**
   * Drops every buffered record and closes the sources that support it.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const slot of this.slots) {
      slot.buffer.clear();
    }
    this.slots = [];
    this.deferredError = undefined;
    this.finish();

    await Promise.all(
      this.sources.map(source => (source.close ? source.close() : Promise.resolve()))
    );
  }

  private recordFlush(horizon: number, records: R[], forced: boolean): void {
    const previousHorizon = this.lastHorizon;
    if (previousHorizon !== undefined) {
      let late = 0;
      for (const record of records) {
        if (record.timestamp < previousHorizon) late++;
      }
      if (late > 0) {
        this.emit('outOfOrder', { records: late, horizon, previousHorizon });
      }
    }
    this.lastHorizon = previousHorizon === undefined ? horizon : Math.max(previousHorizon, horizon);
    this.emit('flush', { horizon, records: records.length, forced });
  }

  private failWith(buffer: SourceBuffer<R>, error: Error): PollResult<Batch<R>> {
    const buffers = this.slots.map(slot => slot.buffer);
    this.slots = [];

    if (this.options.flushOnError) {
      const salvaged = gatherAll(buffers);
      this.emit('sourceError', { index: buffer.index, name: buffer.name, error, discarded: 0 });
      if (salvaged.length > 0) {
        this.deferredError = error;
        return ready(salvaged);
      }
    } else {
      let discarded = 0;
      for (const b of buffers) {
        discarded += b.clear();
      }
      this.emit('sourceError', { index: buffer.index, name: buffer.name, error, discarded });
    }

    this.finish();
    return failed(error);
  }

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    this.emit('finished');
  }
}

import { SourceBuffer } from './source-buffer';
import { done, pending, PollResult, ready, Timestamped } from './types';

/** What one buffer's source did during the current tick. */
export interface SourceTick<R extends Timestamped> {
  buffer: SourceBuffer<R>;
  /** Nothing new arrived: would-block, an empty batch, or already complete. */
  stalled: boolean;
}

export interface TickSummary {
  remaining: number;
  stalled: number;
  settled: number;
  maxTimeSpread: number;
}

export interface FlushDecision {
  flush: boolean;
  /** The latency bound, not readiness, triggered this flush. */
  forced: boolean;
}

/**
 * A buffer is settled once it holds two batches (its watermark no longer
 * comes from a batch that just arrived) or its source has completed.
 */
export function isSettled<R extends Timestamped>(buffer: SourceBuffer<R>): boolean {
  return buffer.bufferedBatchCount() >= 2 || buffer.isComplete();
}

export function summarizeTick<R extends Timestamped>(
  ticks: readonly SourceTick<R>[]
): TickSummary {
  const summary: TickSummary = { remaining: ticks.length, stalled: 0, settled: 0, maxTimeSpread: 0 };
  for (const { buffer, stalled } of ticks) {
    if (stalled) summary.stalled++;
    if (isSettled(buffer)) summary.settled++;
    summary.maxTimeSpread = Math.max(summary.maxTimeSpread, buffer.span());
  }
  return summary;
}

export function isFlushDue(summary: TickSummary, maxBufferSpan: number): FlushDecision {
  const allSettled = summary.settled === summary.remaining;
  const overBudget = summary.maxTimeSpread > maxBufferSpan;
  return {
    flush: allSettled || overBudget,
    forced: overBudget && !allSettled,
  };
}

/**
 * Folds a tick into the merger's own poll answer, given the summary of the
 * buffers left after exhausted ones were removed. Released records are
 * always handed out, even when every source stalled.
 */
export function decideTick<R extends Timestamped>(
  produced: R[],
  summary: TickSummary
): PollResult<R[]> {
  if (produced.length > 0) {
    return ready(produced);
  }
  if (summary.remaining === 0) {
    return done();
  }
  if (summary.stalled >= summary.remaining) {
    return pending();
  }
  return ready(produced);
}

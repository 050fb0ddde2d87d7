import { SourceBuffer } from './source-buffer';
import { Timestamped } from './types';
import { sortByTimestamp } from './utils';

export interface Release<R extends Timestamped> {
  horizon?: number;
  records: R[];
}

/**
 * Low watermark across buffers: once every source has produced data up to
 * T, none of them can still produce a record at or before T.
 * Buffers holding nothing contribute no watermark.
 */
export function computeReleaseHorizon<R extends Timestamped>(
  buffers: Iterable<SourceBuffer<R>>
): number | undefined {
  let horizon: number | undefined;
  for (const buffer of buffers) {
    const watermark = buffer.latestTimestamp();
    if (watermark === undefined) continue;
    horizon = horizon === undefined ? watermark : Math.min(horizon, watermark);
  }
  return horizon;
}

/**
 * Removes every record at or before the release horizon from all buffers
 * and returns them time-sorted. Equal timestamps keep buffer order, then
 * arrival order within a buffer.
 */
export function gatherReleasable<R extends Timestamped>(
  buffers: readonly SourceBuffer<R>[]
): Release<R> {
  const horizon = computeReleaseHorizon(buffers);
  if (horizon === undefined) {
    return { records: [] };
  }

  const records: R[] = [];
  for (const buffer of buffers) {
    records.push(...buffer.releaseUpTo(horizon));
  }
  return { horizon, records: sortByTimestamp(records) };
}

/** Everything buffered, sorted, with no regard for horizon safety. */
export function gatherAll<R extends Timestamped>(
  buffers: readonly SourceBuffer<R>[]
): R[] {
  const records: R[] = [];
  for (const buffer of buffers) {
    records.push(...buffer.drain());
  }
  return sortByTimestamp(records);
}

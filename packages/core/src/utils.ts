import { MergeError, Timestamped } from './types';

export function parseTimeWindow(window: string): number {
  const match = window.match(/^(\d+)(ms|[smhd])$/);
  if (!match) {
    throw new Error(`Invalid time window format: ${window}`);
  }

  const value = parseInt(match[1], 10);
  const unit = match[2];

  switch (unit) {
    case 'ms':
      return value;
    case 's':
      return value * 1000;
    case 'm':
      return value * 60 * 1000;
    case 'h':
      return value * 60 * 60 * 1000;
    case 'd':
      return value * 24 * 60 * 60 * 1000;
    default:
      throw new Error(`Unknown time unit: ${unit}`);
  }
}

/**
 * Resolves a duration option given either as milliseconds or as a
 * `parseTimeWindow` string.
 */
export function resolveBufferSpan(value: string | number): number {
  let ms: number;
  try {
    ms = typeof value === 'string' ? parseTimeWindow(value.trim()) : value;
  } catch (error) {
    throw new MergeError(
      `Invalid max buffer span: ${value}`,
      'INVALID_BUFFER_SPAN',
      { value, error }
    );
  }

  if (!Number.isFinite(ms) || ms < 0) {
    throw new MergeError(
      `Max buffer span must be a non-negative duration, got ${value}`,
      'INVALID_BUFFER_SPAN',
      { value }
    );
  }
  return ms;
}

export function compareByTimestamp(a: Timestamped, b: Timestamped): number {
  return a.timestamp - b.timestamp;
}

// Array.prototype.sort is stable, so equal timestamps keep concatenation order.
export function sortByTimestamp<R extends Timestamped>(records: R[]): R[] {
  return records.sort(compareByTimestamp);
}

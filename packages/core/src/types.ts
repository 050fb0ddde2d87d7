export interface Timestamped {
  /** Logical clock in milliseconds; only used for ordering and spans. */
  timestamp: number;
}

export interface CapturedRecord extends Timestamped {
  payload: Uint8Array;
  declaredLength: number;
  actualLength: number;
}

export type Batch<R extends Timestamped = CapturedRecord> = readonly R[];

export type PollResult<T> =
  | { kind: 'ready'; value: T }
  | { kind: 'pending' }
  | { kind: 'error'; error: Error }
  | { kind: 'done' };

export interface Waker {
  wake(): void;
}

/**
 * A non-blocking producer of record batches.
 *
 * `poll` must return immediately. A source answering `pending` is
 * responsible for calling `waker.wake()` once it has something to report;
 * after `done` it is never polled again.
 */
export interface PollableSource<R extends Timestamped = CapturedRecord> {
  readonly name?: string;
  poll(waker: Waker): PollResult<Batch<R>>;
  close?(): Promise<void>;
}

export interface MergerOptions {
  maxBufferSpan?: string | number;
  flushOnError?: boolean;
}

export type MergerState = 'active' | 'draining' | 'finished';

export interface FlushInfo {
  horizon: number;
  records: number;
  forced: boolean;
}

export interface OutOfOrderInfo {
  records: number;
  horizon: number;
  previousHorizon: number;
}

export interface SourceInfo {
  index: number;
  name?: string;
}

export interface SourceErrorInfo extends SourceInfo {
  error: Error;
  discarded: number;
}

export interface MergerEvents {
  flush: (info: FlushInfo) => void;
  outOfOrder: (info: OutOfOrderInfo) => void;
  sourceCompleted: (info: SourceInfo) => void;
  sourceError: (info: SourceErrorInfo) => void;
  stalled: (info: { remaining: number }) => void;
  finished: () => void;
}

export type MergeErrorCode =
  | 'NO_SOURCES'
  | 'DUPLICATE_SOURCE'
  | 'INVALID_BUFFER_SPAN'
  | 'SOURCE_ALREADY_COMPLETE';

export class MergeError extends Error {
  code: MergeErrorCode;
  details?: unknown;

  constructor(message: string, code: MergeErrorCode, details?: unknown) {
    super(message);
    this.name = 'MergeError';
    this.code = code;
    this.details = details;
  }
}

export const ready = <T>(value: T): PollResult<T> => ({ kind: 'ready', value });
export const pending = <T>(): PollResult<T> => ({ kind: 'pending' });
export const done = <T>(): PollResult<T> => ({ kind: 'done' });
export const failed = <T>(error: Error): PollResult<T> => ({ kind: 'error', error });

import { Batch, CapturedRecord, PollableSource, Timestamped, Waker } from './types';

export interface WakeSignal {
  waker: Waker;
  promise: Promise<void>;
}

/** One-shot waker whose promise settles on the first `wake()`. */
export function createWakeSignal(): WakeSignal {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return {
    waker: { wake: () => resolve() },
    promise,
  };
}

/**
 * Drives a pollable source as an async iterable. Empty batches are skipped,
 * a source error is thrown, and the source is closed when iteration stops
 * for any reason.
 */
export async function* iterateSource<R extends Timestamped = CapturedRecord>(
  source: PollableSource<R>
): AsyncGenerator<Batch<R>> {
  try {
    while (true) {
      const signal = createWakeSignal();
      const result = source.poll(signal.waker);

      switch (result.kind) {
        case 'ready':
          if (result.value.length > 0) {
            yield result.value;
          }
          break;
        case 'pending':
          await signal.promise;
          break;
        case 'error':
          throw result.error;
        case 'done':
          return;
      }
    }
  } finally {
    if (source.close) {
      await source.close();
    }
  }
}

export async function collectRecords<R extends Timestamped = CapturedRecord>(
  source: PollableSource<R>
): Promise<R[]> {
  const records: R[] = [];
  for await (const batch of iterateSource(source)) {
    records.push(...batch);
  }
  return records;
}

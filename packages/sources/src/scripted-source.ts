import {
  Batch,
  CapturedRecord,
  PollableSource,
  PollResult,
  Timestamped,
  Waker,
} from '@chronomerge/core';

export type ScriptStep<R extends Timestamped = CapturedRecord> = Batch<R> | 'pending' | Error;

export interface ScriptedSourceOptions {
  name?: string;
  /** Wake the caller on a zero-delay timer after each `pending` step. */
  autoWake?: boolean;
}

/**
 * Replays a fixed script, one step per poll, then reports `done` forever.
 * Used to simulate jittery producers deterministically.
 */
export class ScriptedSource<R extends Timestamped = CapturedRecord> implements PollableSource<R> {
  readonly name?: string;
  private steps: ScriptStep<R>[];
  private autoWake: boolean;
  private position = 0;
  pollCount = 0;
  closed = false;

  constructor(steps: readonly ScriptStep<R>[], options: ScriptedSourceOptions = {}) {
    this.steps = [...steps];
    this.name = options.name;
    this.autoWake = options.autoWake ?? true;
  }

  poll(waker: Waker): PollResult<Batch<R>> {
    this.pollCount++;

    if (this.closed || this.position >= this.steps.length) {
      return { kind: 'done' };
    }

    const step = this.steps[this.position++];
    if (step === 'pending') {
      if (this.autoWake) {
        setTimeout(() => waker.wake(), 0);
      }
      return { kind: 'pending' };
    }
    if (step instanceof Error) {
      return { kind: 'error', error: step };
    }
    return { kind: 'ready', value: step };
  }

  remainingSteps(): number {
    return Math.max(0, this.steps.length - this.position);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

import { decideTick, isFlushDue, isSettled, summarizeTick, TickSummary } from './backpressure';
import { SourceBuffer } from './source-buffer';
import { Timestamped } from './types';

describe('tick backpressure', () => {
  const bufferWith = (...batches: number[][]): SourceBuffer<Timestamped> => {
    const buffer = new SourceBuffer<Timestamped>(0);
    for (const batch of batches) {
      buffer.accept(batch.map(timestamp => ({ timestamp })));
    }
    return buffer;
  };

  const summaryOf = (fields: Partial<TickSummary>): TickSummary => ({
    remaining: 0,
    stalled: 0,
    settled: 0,
    maxTimeSpread: 0,
    ...fields,
  });

  describe('isSettled', () => {
    it('should need two batches or completion', () => {
      const single = bufferWith([1, 2]);
      const double = bufferWith([1], [2]);
      const complete = bufferWith();
      complete.markComplete();

      expect(isSettled(single)).toBe(false);
      expect(isSettled(double)).toBe(true);
      expect(isSettled(complete)).toBe(true);
    });
  });

  describe('summarizeTick', () => {
    it('should fold stalled and settled counts and the widest span', () => {
      const summary = summarizeTick([
        { buffer: bufferWith([0, 40]), stalled: false },
        { buffer: bufferWith([10], [15]), stalled: true },
        { buffer: bufferWith(), stalled: true },
      ]);

      expect(summary).toEqual({ remaining: 3, stalled: 2, settled: 1, maxTimeSpread: 40 });
    });

    it('should summarize an empty tick as nothing remaining', () => {
      expect(summarizeTick([])).toEqual(summaryOf({}));
    });
  });

  describe('isFlushDue', () => {
    it('should flush once every source is settled', () => {
      expect(isFlushDue(summaryOf({ remaining: 2, settled: 2, maxTimeSpread: 0 }), 100)).toEqual({
        flush: true,
        forced: false,
      });
    });

    it('should hold while a source is unsettled and within budget', () => {
      expect(isFlushDue(summaryOf({ remaining: 2, settled: 1, maxTimeSpread: 100 }), 100)).toEqual({
        flush: false,
        forced: false,
      });
    });

    it('should force a flush once the spread exceeds the budget', () => {
      expect(isFlushDue(summaryOf({ remaining: 2, settled: 1, maxTimeSpread: 101 }), 100)).toEqual({
        flush: true,
        forced: true,
      });
    });

    it('should not call a flush forced when sources were settled anyway', () => {
      expect(isFlushDue(summaryOf({ remaining: 1, settled: 1, maxTimeSpread: 500 }), 100)).toEqual({
        flush: true,
        forced: false,
      });
    });
  });

  describe('decideTick', () => {
    it('should finish when nothing is produced and no source remains', () => {
      expect(decideTick([], summaryOf({}))).toEqual({ kind: 'done' });
    });

    it('should report pending when every remaining source stalled', () => {
      expect(decideTick([], summaryOf({ remaining: 2, stalled: 2 }))).toEqual({ kind: 'pending' });
    });

    it('should hand out an empty batch when some source made progress', () => {
      expect(decideTick([], summaryOf({ remaining: 2, stalled: 1 }))).toEqual({ kind: 'ready', value: [] });
    });

    it('should never withhold released records', () => {
      const produced = [{ timestamp: 1 }];

      expect(decideTick(produced, summaryOf({ remaining: 2, stalled: 2 }))).toEqual({ kind: 'ready', value: produced });
      expect(decideTick(produced, summaryOf({}))).toEqual({ kind: 'ready', value: produced });
    });
  });
});

import { BoundedMerger, CapturedRecord, collectRecords, MergeMonitor } from '@chronomerge/core';
import { AsyncIterableSource } from './async-iterable-source';
import { ScriptedSource } from './scripted-source';

describe('Merging live sources', () => {
  const createRecord = (timestamp: number, interfaceName: string): CapturedRecord => ({
    timestamp,
    payload: new TextEncoder().encode(interfaceName),
    declaredLength: interfaceName.length,
    actualLength: interfaceName.length
  });

  const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

  async function* capture(
    interfaceName: string,
    timestamps: number[],
    batchSize: number,
    jitterMs: number
  ): AsyncGenerator<CapturedRecord[]> {
    for (let i = 0; i < timestamps.length; i += batchSize) {
      await delay(jitterMs);
      yield timestamps.slice(i, i + batchSize).map(t => createRecord(t, interfaceName));
    }
  }

  const range = (from: number, to: number, step = 1): number[] => {
    const values: number[] = [];
    for (let t = from; t < to; t += step) {
      values.push(t);
    }
    return values;
  };

  const isSorted = (records: CapturedRecord[]) =>
    records.every((record, i) => i === 0 || records[i - 1].timestamp <= record.timestamp);

  it('should merge jittery async captures into one ordered sequence', async () => {
    const eth0 = range(0, 200, 2);
    const eth1 = range(1, 200, 3);
    const wlan0 = range(50, 120);

    const merger = new BoundedMerger(
      [
        new AsyncIterableSource(capture('eth0', eth0, 7, 1), { name: 'eth0' }),
        new AsyncIterableSource(capture('eth1', eth1, 5, 2), { name: 'eth1' }),
        new AsyncIterableSource(capture('wlan0', wlan0, 11, 0), { name: 'wlan0' })
      ],
      { maxBufferSpan: '1h' }
    );
    const monitor = new MergeMonitor();
    monitor.attach(merger);

    const records = await collectRecords(merger);

    expect(records).toHaveLength(eth0.length + eth1.length + wlan0.length);
    expect(isSorted(records)).toBe(true);
    expect(records.map(r => r.timestamp)).toEqual(
      [...eth0, ...eth1, ...wlan0].sort((a, b) => a - b)
    );
    expect(monitor.getMetrics().recordsReleased).toBe(records.length);
    expect(monitor.getMetrics().forcedFlushes).toBe(0);
    expect(monitor.getMetrics().sourcesCompleted).toBe(3);
  });

  it('should merge scripted sources that stall between batches', async () => {
    const a = new ScriptedSource<CapturedRecord>([
      [createRecord(0, 'a'), createRecord(4, 'a')],
      'pending',
      [createRecord(8, 'a')],
      'pending',
      'pending',
      [createRecord(12, 'a')]
    ]);
    const b = new ScriptedSource<CapturedRecord>([
      'pending',
      [createRecord(1, 'b')],
      [createRecord(5, 'b'), createRecord(9, 'b')],
      'pending',
      [createRecord(13, 'b')]
    ]);

    const records = await collectRecords(new BoundedMerger([a, b], { maxBufferSpan: 1000 }));

    expect(records.map(r => r.timestamp)).toEqual([0, 1, 4, 5, 8, 9, 12, 13]);
    expect(a.closed).toBe(true);
    expect(b.closed).toBe(true);
  });

  it('should surface a capture failure to the consumer', async () => {
    async function* failing(): AsyncGenerator<CapturedRecord[]> {
      yield [createRecord(1, 'eth0')];
      await delay(1);
      throw new Error('permission denied');
    }

    const merger = new BoundedMerger([
      new AsyncIterableSource(failing(), { name: 'eth0' }),
      new AsyncIterableSource(capture('eth1', range(0, 10), 2, 1), { name: 'eth1' })
    ]);

    await expect(collectRecords(merger)).rejects.toThrow('permission denied');
  });
});

import { EventEmitter } from 'eventemitter3';
import { FlushInfo, MergerEvents, OutOfOrderInfo, SourceErrorInfo } from './types';

export interface MergeMetrics {
  flushes: number;
  forcedFlushes: number;
  recordsReleased: number;
  outOfOrderRecords: number;
  recordsDiscarded: number;
  sourcesCompleted: number;
  errors: number;
  stalledTicks: number;
  throughput: number;
  startTime: number;
  uptime: number;
}

export interface MonitorEvents {
  metrics: (metrics: MergeMetrics) => void;
  highOutOfOrderRate: (info: { ratio: number }) => void;
}

export type MergerEmitter = InstanceType<typeof EventEmitter<MergerEvents>>;

/** Anything that emits the merger's diagnostic events. */
export type MergerEventSource = Pick<MergerEmitter, 'on' | 'off'>;

const createMetrics = (now: number): MergeMetrics => ({
  flushes: 0,
  forcedFlushes: 0,
  recordsReleased: 0,
  outOfOrderRecords: 0,
  recordsDiscarded: 0,
  sourcesCompleted: 0,
  errors: 0,
  stalledTicks: 0,
  throughput: 0,
  startTime: now,
  uptime: 0,
});

export class MergeMonitor extends EventEmitter<MonitorEvents> {
  private metrics: MergeMetrics;
  private lastThroughputCheck: number;
  private lastReleasedCount = 0;
  private monitoringInterval?: NodeJS.Timeout;
  private detachers: Array<() => void> = [];

  constructor(private intervalMs: number = 5000, private outOfOrderThreshold = 0.01) {
    super();
    const now = Date.now();
    this.metrics = createMetrics(now);
    this.lastThroughputCheck = now;
  }

  attach(merger: MergerEventSource): void {
    const onFlush = (info: FlushInfo) => {
      this.metrics.flushes++;
      this.metrics.recordsReleased += info.records;
      if (info.forced) this.metrics.forcedFlushes++;
    };
    const onOutOfOrder = (info: OutOfOrderInfo) => {
      this.metrics.outOfOrderRecords += info.records;
    };
    const onCompleted = () => {
      this.metrics.sourcesCompleted++;
    };
    const onError = (info: SourceErrorInfo) => {
      this.metrics.errors++;
      this.metrics.recordsDiscarded += info.discarded;
    };
    const onStalled = () => {
      this.metrics.stalledTicks++;
    };

    merger.on('flush', onFlush);
    merger.on('outOfOrder', onOutOfOrder);
    merger.on('sourceCompleted', onCompleted);
    merger.on('sourceError', onError);
    merger.on('stalled', onStalled);

    this.detachers.push(() => {
      merger.off('flush', onFlush);
      merger.off('outOfOrder', onOutOfOrder);
      merger.off('sourceCompleted', onCompleted);
      merger.off('sourceError', onError);
      merger.off('stalled', onStalled);
    });
  }

  detach(): void {
    for (const detach of this.detachers) {
      detach();
    }
    this.detachers = [];
  }

  start(): void {
    if (this.monitoringInterval) {
      return;
    }

    this.monitoringInterval = setInterval(() => {
      this.updateMetrics();
      this.emit('metrics', this.getMetrics());
    }, this.intervalMs);

    // Ensure the interval doesn't keep the process alive
    if (typeof this.monitoringInterval.unref === 'function') {
      this.monitoringInterval.unref();
    }
  }

  stop(): void {
    if (this.monitoringInterval) {
      clearInterval(this.monitoringInterval);
      this.monitoringInterval = undefined;
    }
  }

  private updateMetrics(): void {
    const now = Date.now();
    this.metrics.uptime = now - this.metrics.startTime;

    // Records released per second since the previous check
    const timeDiff = (now - this.lastThroughputCheck) / 1000;
    const released = this.metrics.recordsReleased - this.lastReleasedCount;
    this.metrics.throughput = timeDiff > 0 ? released / timeDiff : 0;

    this.lastThroughputCheck = now;
    this.lastReleasedCount = this.metrics.recordsReleased;

    if (this.metrics.recordsReleased > 0) {
      const ratio = this.metrics.outOfOrderRecords / this.metrics.recordsReleased;
      if (ratio > this.outOfOrderThreshold) {
        this.emit('highOutOfOrderRate', { ratio });
      }
    }
  }

  getMetrics(): MergeMetrics {
    return { ...this.metrics };
  }

  reset(): void {
    const now = Date.now();
    this.metrics = createMetrics(now);
    this.lastThroughputCheck = now;
    this.lastReleasedCount = 0;
  }
}

export { BoundedMerger } from './bounded-merger';
export { SourceBuffer } from './source-buffer';
export { computeReleaseHorizon, gatherReleasable, gatherAll } from './watermark';
export type { Release } from './watermark';
export { summarizeTick, isFlushDue, isSettled, decideTick } from './backpressure';
export type { SourceTick, TickSummary, FlushDecision } from './backpressure';
export { iterateSource, collectRecords, createWakeSignal } from './merge-driver';
export type { WakeSignal } from './merge-driver';
export { MergeMonitor } from './merge-monitor';
export type { MergeMetrics, MonitorEvents, MergerEmitter, MergerEventSource } from './merge-monitor';
export * from './types';
export * from './utils';

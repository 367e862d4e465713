export type { EventPayload, RawEvent, ColumnValue, ProcessedRow, QueueEntry } from './event.js';
export type { DeliveryStatus, DeliveryOutcome } from './outcome.js';
export { BATCH_MODE, STREAM_MODE, DestinationError } from './destination.js';
export type { DeliveryMode, DestinationAdapter, Lock, MonitorKeeper } from './destination.js';
export * from './enrichment/index.js';
export * from './json-path.js';

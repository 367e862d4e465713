export { eventSchema, eventBatchSchema } from './event-schema.js';
export type { EventInput } from './event-schema.js';
export * from './errors.js';
export * from './destination-schema.js';
export { sanitizeIdentifier, columnForPath, flattenFields } from './columns.js';
export { resolveMappingVariant, createFieldMapper, describeRule } from './field-mapping.js';
export type { MappingVariant, FieldMapper, FieldMapperSetup } from './field-mapping.js';
export { DEFAULT_TABLE_NAME, createTableNameResolver } from './table-name.js';
export type { TableNameResolver } from './table-name.js';
export { TransformPipeline } from './transform-pipeline.js';
export type { TransformPipelineOptions, ProcessResult } from './transform-pipeline.js';
export { OutcomeCache, DEFAULT_OUTCOME_CAPACITY } from './outcome-cache.js';
export { backoffDelay, isRetryable, sleep } from './retry-policy.js';
export { StorageProxy } from './storage-proxy.js';
export type { DurableQueue, ProxyState, StorageProxyOptions, ConsumeResult, ProxySummary } from './storage-proxy.js';
export { DestinationRegistry } from './destination-registry.js';
export type {
  AdapterContext,
  AdapterFactory,
  QueueOpener,
  DestinationDeps,
  DestinationSpec,
  Destination,
} from './destination-registry.js';
export { DestinationService } from './destination-service.js';
export type { IngestResult, IngestStatus, DestinationSummary } from './destination-service.js';

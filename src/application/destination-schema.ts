import { z } from 'zod';

/**
 * Zod schemas for one entry of the `destinations` configuration map.
 *
 * Mode is validated outside the schema so the error can name the
 * available modes. Adapter-specific blocks (`postgres`, `datasource`, ...)
 * pass through untouched.
 */

export const mappingTypeSchema = z.enum(['default', 'strict']);

export type MappingType = z.infer<typeof mappingTypeSchema>;

export const mappingActionSchema = z.enum(['move', 'remove', 'cast', 'constant']);

export type MappingAction = z.infer<typeof mappingActionSchema>;

/** Structured mapping rule: `{ src, dst, action, type, value }`. */
export const mappingFieldSchema = z.object({
  src: z.string().optional(),
  dst: z.string().optional(),
  action: mappingActionSchema,
  type: z.string().optional(),
  value: z.unknown().optional(),
});

export type MappingFieldConfig = z.infer<typeof mappingFieldSchema>;

export const structuredMappingSchema = z.object({
  keep_unmapped: z.boolean().optional(),
  fields: z.array(mappingFieldSchema).default([]),
});

export type StructuredMappingConfig = z.infer<typeof structuredMappingSchema>;

export const dataLayoutSchema = z.object({
  mapping_type: mappingTypeSchema.optional(),
  mapping: z.array(z.string()).optional(),
  mappings: structuredMappingSchema.optional(),
  table_name_template: z.string().optional(),
  primary_key_fields: z.array(z.string().min(1)).optional(),
});

export type DataLayoutConfig = z.infer<typeof dataLayoutSchema>;

export const enrichmentRuleSchema = z.object({
  name: z.string().min(1),
  from: z.string().min(1),
  to: z.string().min(1),
});

export const batchSettingsSchema = z.object({
  flush_interval_ms: z.number().int().min(10).default(5_000),
  batch_size: z.number().int().min(1).default(500),
  max_buffered_rows: z.number().int().min(1).default(10_000),
});

export type BatchSettings = z.infer<typeof batchSettingsSchema>;

export const retrySettingsSchema = z.object({
  max_attempts: z.number().int().min(1).max(100).default(5),
  base_delay_ms: z.number().int().min(0).default(1_000),
  max_delay_ms: z.number().int().min(0).default(60_000),
});

export type RetrySettings = z.infer<typeof retrySettingsSchema>;

export const queueSettingsSchema = z.object({
  max_bytes: z.number().int().min(1_024).default(256 * 1024 * 1024),
  segment_bytes: z.number().int().min(1_024).default(16 * 1024 * 1024),
}).refine((q) => q.segment_bytes < q.max_bytes, {
  message: 'segment_bytes must be smaller than max_bytes',
  path: ['segment_bytes'],
});

export type QueueSettings = z.infer<typeof queueSettingsSchema>;

export const destinationConfigSchema = z.object({
  only_tokens: z.array(z.string()).default([]),
  type: z.string().optional(),
  mode: z.string().optional(),
  break_on_error: z.boolean().default(false),
  data_layout: dataLayoutSchema.optional(),
  enrichment: z.array(enrichmentRuleSchema).default([]),
  batch: batchSettingsSchema.default({}),
  retry: retrySettingsSchema.default({}),
  queue: queueSettingsSchema.default({}),
  shutdown_timeout_ms: z.number().int().min(0).default(10_000),
}).passthrough();

/** Raw destination configuration as written in the config file. */
export type DestinationConfigInput = z.input<typeof destinationConfigSchema>;

/** Destination configuration with schema defaults applied. */
export type DestinationConfig = z.infer<typeof destinationConfigSchema>;

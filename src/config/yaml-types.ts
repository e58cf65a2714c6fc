import { z } from 'zod';

const RetrySchema = z.object({
  attempts: z.number().int().positive().default(4),
  base_delay_ms: z.number().int().nonnegative().default(1000),
  max_delay_ms: z.number().int().positive().default(8000),
  factor: z.number().min(1).default(2),
  // Fraction of the delay, 0 keeps the schedule exact
  jitter: z.number().min(0).max(1).default(0)
});

export type RetrySettings = z.infer<typeof RetrySchema>;

export const PipelineFileSchema = z.object({
  catalog: z
    .object({
      // Upstream rejects anything above 50 for both calls
      page_size: z.number().int().min(1).max(50).default(50),
      batch_size: z.number().int().min(1).max(50).default(50),
      timeout_ms: z.number().int().positive().default(30000),
      retries: RetrySchema.default({})
    })
    .default({}),
  analytics: z
    .object({
      max_results: z.number().int().min(1).max(200).default(200),
      timeout_ms: z.number().int().positive().default(30000),
      retries: RetrySchema.default({})
    })
    .default({}),
  backfill: z
    .object({
      pause_ms: z.number().int().nonnegative().default(1000)
    })
    .default({})
});

export type PipelineFile = z.infer<typeof PipelineFileSchema>;

/** Settings used when no pipeline.yaml is present */
export const DEFAULT_PIPELINE: PipelineFile = PipelineFileSchema.parse({});

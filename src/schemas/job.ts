import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { JobConfig } from '../types/job.js';

export const JobStatusSchema = z.enum(['pending', 'running', 'completed', 'failed', 'cancelled']);
export const SummaryModeSchema = z.enum(['brief', 'detailed', 'bullets']);
export const SummarizerBackendSchema = z.enum(['openai', 'hf', 'extractive']);
export const EntityTypeSchema = z.enum(['date', 'money', 'person', 'organization', 'location']);

export const InputHandleSchema = z.object({
  uri: z.string().min(1),
  filename: z.string().min(1).optional(),
  sizeBytes: z.number().int().nonnegative().optional(),
  mediaType: z.string().min(1).optional(),
});

export const JobConfigInputSchema = z.object({
  summaryMode: SummaryModeSchema.optional(),
  backend: SummarizerBackendSchema.optional(),
  extractEntities: z.boolean().optional(),
  entityTypes: z.array(EntityTypeSchema).min(1).nullable().optional(),
  maxPages: z.number().int().min(1).optional(),
  extractTables: z.boolean().optional(),
}).strict();

export const CreateJobSchema = z.object({
  input: InputHandleSchema,
  config: JobConfigInputSchema.default({}),
});

export const JobQuerySchema = z.object({
  status: JobStatusSchema.optional(),
  limit: z.preprocess(
    (val) => val === undefined ? 50 : Number(val),
    z.number().int().min(1).max(100)
  ).default(50),
});

export const JobParamsSchema = z.object({
  jobId: z.string().min(1),
});

export const JobDetailsQuerySchema = z.object({
  includePartialResults: z.enum(['0', '1']).default('0'),
});

export type CreateJobRequest = z.infer<typeof CreateJobSchema>;
export type JobConfigInput = z.infer<typeof JobConfigInputSchema>;
export type JobListQuery = z.infer<typeof JobQuerySchema>;
export type JobParams = z.infer<typeof JobParamsSchema>;
export type JobDetailsQuery = z.infer<typeof JobDetailsQuerySchema>;

/** Parses `value` or throws a ValidationError carrying the zod issues. */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, message: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(message, { details: result.error.errors });
  }
  return result.data;
}

/** Fills unset fields from the service defaults and checks the page cap. */
export function resolveJobConfig(input: JobConfigInput, defaults: JobConfig, maxPagesLimit: number): JobConfig {
  const parsed = parseOrThrow(JobConfigInputSchema, input, 'Invalid job config');

  const config: JobConfig = {
    summaryMode: parsed.summaryMode ?? defaults.summaryMode,
    backend: parsed.backend ?? defaults.backend,
    extractEntities: parsed.extractEntities ?? defaults.extractEntities,
    entityTypes: parsed.entityTypes === undefined ? defaults.entityTypes : parsed.entityTypes,
    maxPages: parsed.maxPages ?? defaults.maxPages,
    extractTables: parsed.extractTables ?? defaults.extractTables,
  };

  if (config.maxPages > maxPagesLimit) {
    throw new ValidationError(`maxPages must be between 1 and ${maxPagesLimit}`, { maxPages: config.maxPages });
  }
  return config;
}

import { z } from 'zod';
import { SummarizerBackendSchema, SummaryModeSchema } from './schemas/job.js';
import type { BackendsConfig } from './summarizers/index.js';
import type { JobConfig } from './types/job.js';

function envFlag(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value) => value === undefined ? defaultValue : ['1', 'true', 'yes'].includes(value.toLowerCase()));
}

// Empty strings count as unset
function optionalSecret() {
  return z.string().optional().transform((value) => value ? value : undefined);
}

const MAX_TIMER_MS = 2_147_483_647;

const envSchema = z.object({
  NODE_ENV: z.string().optional().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional().default('info'),
  PORT: z.coerce.number().int().min(0).max(65535).optional().default(4600),
  HOST: z.string().optional().default('0.0.0.0'),
  DOCUMENT_ROOT: z.string().min(1).optional().default('./documents'),
  CORS_DEV: envFlag(false),
  MAX_CONCURRENT_RUNS: z.coerce.number().int().min(1).optional().default(4),
  // setTimeout overflows past a signed 32-bit delay
  JOB_MAX_RUN_MS: z.coerce.number().int().min(1).max(MAX_TIMER_MS).optional().default(120000),
  DEFAULT_SUMMARY_MODE: SummaryModeSchema.optional().default('brief'),
  DEFAULT_SUMMARY_BACKEND: SummarizerBackendSchema.optional().default('extractive'),
  DEFAULT_MAX_PAGES: z.coerce.number().int().min(1).optional().default(3),
  MAX_PAGES_LIMIT: z.coerce.number().int().min(1).optional().default(10),
  ENABLE_ENTITY_EXTRACTION: envFlag(true),
  ENABLE_TABLE_EXTRACTION: envFlag(true),
  OPENAI_API_KEY: optionalSecret(),
  OPENAI_BASE_URL: z.string().url().optional().default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().optional().default('gpt-3.5-turbo'),
  HF_API_TOKEN: optionalSecret(),
  HF_BASE_URL: z.string().url().optional().default('https://api-inference.huggingface.co'),
  HF_MODEL: z.string().optional().default('facebook/bart-large-cnn'),
});

export interface AppConfig {
  env: string;
  logLevel: string;
  server: {
    port: number;
    host: string;
    corsDev: boolean;
  };
  documents: {
    /** Directory that every submitted uri must resolve inside */
    root: string;
  };
  worker: {
    maxConcurrentRuns: number;
    jobMaxRunMs: number;
  };
  pipeline: {
    defaults: JobConfig;
    maxPagesLimit: number;
  };
  backends: BackendsConfig;
}

/** Reads and validates the environment. Throws on the first bad value. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }
  const env = parsed.data;

  if (env.DEFAULT_MAX_PAGES > env.MAX_PAGES_LIMIT) {
    throw new Error('Invalid environment configuration: DEFAULT_MAX_PAGES exceeds MAX_PAGES_LIMIT');
  }

  return {
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    server: {
      port: env.PORT,
      host: env.HOST,
      corsDev: env.CORS_DEV,
    },
    documents: {
      root: env.DOCUMENT_ROOT,
    },
    worker: {
      maxConcurrentRuns: env.MAX_CONCURRENT_RUNS,
      jobMaxRunMs: env.JOB_MAX_RUN_MS,
    },
    pipeline: {
      defaults: {
        summaryMode: env.DEFAULT_SUMMARY_MODE,
        backend: env.DEFAULT_SUMMARY_BACKEND,
        extractEntities: env.ENABLE_ENTITY_EXTRACTION,
        entityTypes: null,
        maxPages: env.DEFAULT_MAX_PAGES,
        extractTables: env.ENABLE_TABLE_EXTRACTION,
      },
      maxPagesLimit: env.MAX_PAGES_LIMIT,
    },
    backends: {
      openai: env.OPENAI_API_KEY
        ? { apiKey: env.OPENAI_API_KEY, baseUrl: env.OPENAI_BASE_URL, model: env.OPENAI_MODEL }
        : null,
      hf: env.HF_API_TOKEN
        ? { token: env.HF_API_TOKEN, baseUrl: env.HF_BASE_URL, model: env.HF_MODEL }
        : null,
    },
  };
}

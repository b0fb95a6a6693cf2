import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const unitInterval = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
  LLM_MODEL: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),

  VECTOR_STORE: z.enum(['pgvector', 'memory']).default('pgvector'),
  VECTOR_COLLECTION: z.string().default('knowledge_base'),
  KNOWLEDGE_BASE_DIR: z.string().default('./knowledge_base'),
  RAG_TOP_K: z.coerce.number().int().positive().default(8),
  RAG_CONFIDENCE_THRESHOLD: unitInterval(0.6),
  RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(600),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(100),

  CONFIDENCE_HIGH_THRESHOLD: unitInterval(0.75),
  CONFIDENCE_LOW_THRESHOLD: unitInterval(0.5),

  RERANK_SIMILARITY_WEIGHT: unitInterval(0.6),
  RERANK_RECENCY_WEIGHT: unitInterval(0.2),
  RERANK_QUALITY_WEIGHT: unitInterval(0.2),
  RERANK_RECENCY_HALF_LIFE_DAYS: z.coerce.number().positive().default(90),
  RERANK_CONFLICT_SPREAD: unitInterval(0.3),

  TOOL_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  TOOL_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),

  SENDGRID_API_KEY: optionalString,
  SENDGRID_FROM_EMAIL: optionalString,
  GOOGLE_CALENDAR_CREDENTIALS: optionalString,
  GOOGLE_CALENDAR_ID: optionalString,

  API_KEYS: optionalString,
  SENTRY_DSN: z.string().optional(),

  ENABLE_BACKGROUND_JOBS: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  FOLLOWUP_CHECK_INTERVAL_MINUTES: z.coerce.number().int().positive().default(30),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;

export type Env = typeof env;

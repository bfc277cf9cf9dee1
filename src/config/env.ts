import { z } from 'zod';

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3001), // Worker health server

  // Database
  DATABASE_URL: z.string().url(),
  DB_POOL_MAX: z.coerce.number().default(10),
  DB_POOL_IDLE_TIMEOUT_MS: z.coerce.number().default(30000),
  DB_POOL_CONNECTION_TIMEOUT_MS: z.coerce.number().default(2000),

  // Redis
  REDIS_URL: z.string().url().default('redis://localhost:6379'),

  // Worker
  VISION_STAGE: z.enum(['embeddings', 'keypoints']).default('embeddings'),
  SERVICE_NAME: z.string().optional(),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  DATA_ROOT: z.string().default('./data'),

  // Queue
  QUEUE_JOB_ATTEMPTS: z.coerce.number().int().min(1).default(4), // 1 delivery + 3 retries
  QUEUE_BACKOFF_DELAY_MS: z.coerce.number().default(1000),
  QUEUE_BACKOFF_MAX_MS: z.coerce.number().default(60000),
  QUEUE_COMPLETED_COUNT: z.coerce.number().default(100),
  QUEUE_FAILED_COUNT: z.coerce.number().default(1000),
  BUS_BINDING_PREFIX: z.string().default('bus:bindings:'),

  // Progress tracking
  WATERMARK_TTL_EMBEDDINGS_SECONDS: z.coerce.number().positive().default(900),
  WATERMARK_TTL_KEYPOINTS_SECONDS: z.coerce.number().positive().default(300),
  WATERMARK_TTL_SEGMENTATION_SECONDS: z.coerce.number().positive().default(300),
  COMPLETION_THRESHOLD_PERCENTAGE: z.coerce
    .number()
    .default(100)
    .transform((val) => Math.max(0, Math.min(val, 100))),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (throws if not initialized)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}

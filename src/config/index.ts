import { getEnv, parseEnv, type Env } from './env.js';
import type { PipelineStage } from '../types/asset.types.js';

export { getEnv, parseEnv, type Env };

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  server: {
    port: number;
    env: 'development' | 'production' | 'test';
  };
  database: {
    url: string;
    poolMax: number;
    poolIdleTimeoutMs: number;
    poolConnectionTimeoutMs: number;
  };
  redis: {
    url: string;
  };
  worker: {
    stage: 'embeddings' | 'keypoints';
    serviceName: string;
    concurrency: number;
    dataRoot: string;
  };
  queue: {
    jobAttempts: number;
    backoffDelayMs: number;
    backoffMaxMs: number;
    completedCount: number;
    failedCount: number;
    bindingPrefix: string;
  };
  progress: {
    watermarkTtlSeconds: Record<PipelineStage, number>;
    completionThresholdPercentage: number;
  };
  logging: {
    level: string;
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    server: {
      port: env.PORT,
      env: env.NODE_ENV,
    },
    database: {
      url: env.DATABASE_URL,
      poolMax: env.DB_POOL_MAX,
      poolIdleTimeoutMs: env.DB_POOL_IDLE_TIMEOUT_MS,
      poolConnectionTimeoutMs: env.DB_POOL_CONNECTION_TIMEOUT_MS,
    },
    redis: {
      url: env.REDIS_URL,
    },
    worker: {
      stage: env.VISION_STAGE,
      serviceName: env.SERVICE_NAME ?? `vision-${env.VISION_STAGE}`,
      concurrency: env.WORKER_CONCURRENCY,
      dataRoot: env.DATA_ROOT,
    },
    queue: {
      jobAttempts: env.QUEUE_JOB_ATTEMPTS,
      backoffDelayMs: env.QUEUE_BACKOFF_DELAY_MS,
      backoffMaxMs: env.QUEUE_BACKOFF_MAX_MS,
      completedCount: env.QUEUE_COMPLETED_COUNT,
      failedCount: env.QUEUE_FAILED_COUNT,
      bindingPrefix: env.BUS_BINDING_PREFIX,
    },
    progress: {
      watermarkTtlSeconds: {
        embeddings: env.WATERMARK_TTL_EMBEDDINGS_SECONDS,
        keypoints: env.WATERMARK_TTL_KEYPOINTS_SECONDS,
        segmentation: env.WATERMARK_TTL_SEGMENTATION_SECONDS,
      },
      completionThresholdPercentage: env.COMPLETION_THRESHOLD_PERCENTAGE,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}

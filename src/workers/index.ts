import 'dotenv/config';
import http from 'node:http';

import { parseEnv } from '../config/env.js';
import { getConfig, type AppConfig } from '../config/index.js';
import { getLogger } from '../utils/logger.js';
import { initDatabase, checkDatabase, closeDatabase } from '../db/index.js';
import { closeRedisConnections } from '../queues/redis.js';
import { BullTopicBus } from '../queues/topic.bus.js';
import { JobProgressManager } from '../progress/job-progress-manager.js';
import { DrizzleAssetStore } from '../services/asset-store.service.js';
import type { AssetStageService, AssetStageServiceDeps } from '../services/asset-stage.service.js';
import { EmbeddingService } from '../services/embedding.service.js';
import { KeypointService } from '../services/keypoint.service.js';
import { SharpGradientKeypointProvider, SharpHistogramEmbeddingProvider } from '../providers/index.js';

let healthServer: http.Server | null = null;

function sendJson(res: http.ServerResponse, status: number, body: Record<string, unknown>): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Liveness and readiness endpoints for the container orchestrator
 */
function startHealthServer(port: number, config: AppConfig, progress: JobProgressManager): void {
  healthServer = http.createServer((req, res) => {
    if (req.method !== 'GET') {
      res.writeHead(405);
      res.end();
      return;
    }

    if (req.url === '/health') {
      sendJson(res, 200, {
        status: 'ok',
        service: config.worker.serviceName,
        trackedStreams: progress.tracker.size,
        watermarkTimers: progress.timers.size,
      });
      return;
    }

    if (req.url === '/ready') {
      void checkDatabase().then(
        (ok) => sendJson(res, ok ? 200 : 503, { status: ok ? 'ready' : 'unavailable', database: ok }),
        (error: unknown) => {
          getLogger().error({ error }, 'Readiness check failed');
          sendJson(res, 503, { status: 'unavailable', database: false });
        }
      );
      return;
    }

    res.writeHead(404);
    res.end();
  });

  healthServer.listen(port, () => {
    getLogger().info({ port }, 'Worker health server started');
  });
}

async function stopHealthServer(): Promise<void> {
  return new Promise((resolve) => {
    if (healthServer) {
      healthServer.close(() => resolve());
    } else {
      resolve();
    }
  });
}

function createStageService(config: AppConfig, deps: AssetStageServiceDeps): AssetStageService {
  if (config.worker.stage === 'keypoints') {
    return new KeypointService(deps, new SharpGradientKeypointProvider({ dataRoot: config.worker.dataRoot }));
  }
  return new EmbeddingService(deps, new SharpHistogramEmbeddingProvider());
}

/**
 * Worker entry point
 */
async function main(): Promise<void> {
  parseEnv();

  const config = getConfig();
  const logger = getLogger();

  logger.info({ env: config.server.env, stage: config.worker.stage }, 'Starting vision worker');

  const db = await initDatabase();

  const bus = new BullTopicBus({
    redisUrl: config.redis.url,
    serviceName: config.worker.serviceName,
    bindingPrefix: config.queue.bindingPrefix,
    concurrency: config.worker.concurrency,
    jobAttempts: config.queue.jobAttempts,
    backoffDelayMs: config.queue.backoffDelayMs,
    backoffMaxMs: config.queue.backoffMaxMs,
    completedCount: config.queue.completedCount,
    failedCount: config.queue.failedCount,
  });
  await bus.connect();

  const progress = new JobProgressManager(bus, {
    watermarkTtlSeconds: config.progress.watermarkTtlSeconds,
    completionThresholdPercentage: config.progress.completionThresholdPercentage,
  });

  const service = createStageService(config, { bus, progress, store: new DrizzleAssetStore(db) });
  await service.subscribe();

  const healthPort = config.server.port;
  startHealthServer(healthPort, config, progress);

  logger.info(
    { stage: service.stage, concurrency: config.worker.concurrency, healthPort },
    'Vision worker started successfully'
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await stopHealthServer();
      await bus.close();
      progress.cleanupAll();
      await closeRedisConnections();
      await closeDatabase();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  // Use stderr for fatal errors before/after logger availability
  process.stderr.write(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
  if (error instanceof Error && error.stack) {
    process.stderr.write(`${error.stack}\n`);
  }
  process.exit(1);
});

import { pino, stdSerializers, type Logger } from 'pino';
import { getConfig } from '../config/index.js';

let logger: Logger | null = null;

/**
 * Root logger of the worker process.
 *
 * Every line carries the bus service name and the vision stage; `error` and
 * `err` fields are serialized with their message and stack.
 */
export function getLogger(): Logger {
  if (logger) {
    return logger;
  }

  const { server, worker, logging } = getConfig();

  logger = pino({
    level: logging.level,
    transport:
      server.env === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    serializers: {
      err: stdSerializers.err,
      error: stdSerializers.err,
    },
    base: {
      service: worker.serviceName,
      stage: worker.stage,
      env: server.env,
    },
  });

  return logger;
}

/**
 * Logger for one module, e.g. `createChildLogger({ service: 'asset-stage' })`
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return getLogger().child(bindings);
}

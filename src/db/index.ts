import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from './schema.js';
import { getConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import { computeBackoffDelay } from '../queues/event-bus.js';

const { Pool } = pg;

/** Attempts at the first connection before the worker gives up */
const CONNECT_ATTEMPTS = 5;
const CONNECT_BACKOFF_BASE_MS = 1000;
const CONNECT_BACKOFF_MAX_MS = 30000;

export type Database = ReturnType<typeof drizzle<typeof schema>>;

let db: Database | null = null;
let pool: pg.Pool | null = null;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function waitForPool(target: pg.Pool): Promise<void> {
  const logger = createChildLogger({ service: 'database' });
  let lastError: Error = new Error('Database connection failed');

  for (let attempt = 1; attempt <= CONNECT_ATTEMPTS; attempt++) {
    try {
      const client = await target.connect();
      client.release();
      logger.info({ attempt }, 'Database connection established');
      return;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt === CONNECT_ATTEMPTS) {
        break;
      }
      const delayMs = computeBackoffDelay(attempt, CONNECT_BACKOFF_BASE_MS, CONNECT_BACKOFF_MAX_MS);
      logger.warn(
        { attempt, maxAttempts: CONNECT_ATTEMPTS, delayMs, error: lastError.message },
        'Database connection attempt failed, retrying'
      );
      await sleep(delayMs);
    }
  }

  logger.error({ error: lastError }, 'Failed to connect to database');
  throw lastError;
}

/**
 * Open the pool backing the asset store. Safe to call more than once.
 */
export async function initDatabase(): Promise<Database> {
  if (db) {
    return db;
  }

  const { database } = getConfig();
  const candidate = new Pool({
    connectionString: database.url,
    max: database.poolMax,
    idleTimeoutMillis: database.poolIdleTimeoutMs,
    connectionTimeoutMillis: database.poolConnectionTimeoutMs,
  });

  try {
    await waitForPool(candidate);
  } catch (error) {
    await candidate.end();
    throw error;
  }

  pool = candidate;
  db = drizzle(pool, { schema });
  return db;
}

export function getDatabase(): Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Readiness check: false when the pool is closed or a trivial query fails
 */
export async function checkDatabase(): Promise<boolean> {
  if (!pool) {
    return false;
  }
  try {
    await pool.query('SELECT 1');
    return true;
  } catch (error) {
    createChildLogger({ service: 'database' }).warn({ error }, 'Database readiness check failed');
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  if (!pool) {
    return;
  }
  const closing = pool;
  pool = null;
  db = null;
  await closing.end();
  createChildLogger({ service: 'database' }).info('Database connection closed');
}

export { schema };

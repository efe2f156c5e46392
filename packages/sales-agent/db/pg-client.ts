// PG client — connection pool singleton for ruvector-postgres
// Provides pool management, health check, retrying queries and vector helpers

import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { sleep } from '../utils/retry.js';

const log = createLogger('pg-client');

// pg is dynamically imported so it's only loaded when postgres backend is selected
let _pool: import('pg').Pool | null = null;
let _pg: typeof import('pg') | null = null;
let _config: PgConfig | null = null;

async function loadPg(): Promise<typeof import('pg')> {
  if (!_pg) {
    _pg = await import('pg');
  }
  return _pg;
}

export interface PgConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolMin?: number;
  poolMax?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

/** Set the connection settings used when the pool is first created */
export function configurePg(config: PgConfig): void {
  _config = config;
}

/**
 * Returns the shared pg.Pool singleton, creating it on first call.
 */
export async function getPool(): Promise<import('pg').Pool> {
  if (_pool) return _pool;
  if (!_config) throw new Error('pg-client: configurePg() must be called before the first query');

  const pg = await loadPg();
  const c = _config;

  const pool = new pg.default.Pool({
    host: c.host,
    port: c.port,
    user: c.user,
    password: c.password,
    database: c.database,
    min: c.poolMin ?? 2,
    max: c.poolMax ?? 10,
    idleTimeoutMillis: c.idleTimeoutMs ?? 30_000,
    connectionTimeoutMillis: c.connectionTimeoutMs ?? 5_000,
    statement_timeout: 30_000,
    application_name: 'sales-insight',
  });

  // Never crash the process on idle-client errors
  pool.on('error', (err) => {
    log.warn('pool background error, resetting pool', { error: err.message });
    void resetPool();
  });

  // Set ruvector ef_search on every new connection for improved recall
  pool.on('connect', (client) => {
    client.query('SET ruvector.ef_search = 100').catch((err: unknown) => {
      log.warn('failed to SET ruvector.ef_search', { error: errorMessage(err) });
    });
  });

  _pool = pool;
  return pool;
}

/**
 * Close the pool and release all connections.
 */
export async function closePool(): Promise<void> {
  if (_pool) {
    const pool = _pool;
    _pool = null;
    await pool.end();
  }
}

/**
 * Drop the current pool so getPool() creates a fresh one.
 */
async function resetPool(): Promise<void> {
  if (_pool) {
    const pool = _pool;
    _pool = null;
    try {
      await pool.end();
    } catch (err) {
      log.debug('pool already broken while resetting', { error: errorMessage(err) });
    }
  }
}

const RECOVERABLE = [
  'Connection terminated',
  'recovery mode',
  'the database system is starting up',
  'connection refused',
  'ECONNREFUSED',
  'terminating connection',
];

/**
 * Execute a query with automatic retry on connection/recovery errors.
 * Uses exponential backoff: base delay * 3^attempt (1s → 3s → 9s by default).
 */
export async function queryWithRetry<T extends import('pg').QueryResultRow>(
  queryText: string,
  params: unknown[],
  maxRetries = 2,
  retryDelayMs = 1000,
): Promise<import('pg').QueryResult<T>> {
  for (let attempt = 0; ; attempt++) {
    try {
      const pool = await getPool();
      return await pool.query<T>(queryText, params);
    } catch (err: unknown) {
      const msg = errorMessage(err);
      const isRecoverable = RECOVERABLE.some((marker) => msg.includes(marker));

      if (attempt < maxRetries && isRecoverable) {
        const delay = retryDelayMs * Math.pow(3, attempt);
        log.warn(`queryWithRetry attempt ${attempt + 1}/${maxRetries} failed, retrying in ${delay}ms`, {
          error: msg,
        });
        await resetPool();
        await sleep(delay);
        continue;
      }

      log.error(`queryWithRetry failed after ${attempt + 1} attempt(s)`, { error: msg });
      throw err;
    }
  }
}

/**
 * Convert a Float32Array to a ruvector literal string: `[0.1,0.2,...]`
 * Uses toFixed(6) to reduce literal size while preserving sufficient precision.
 */
export function float32ToVectorLiteral(vec: Float32Array): string {
  const parts: string[] = [];
  for (let i = 0; i < vec.length; i++) {
    parts.push(vec[i].toFixed(6));
  }
  return `[${parts.join(',')}]`;
}

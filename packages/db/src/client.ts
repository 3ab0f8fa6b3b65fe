import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { createLogger, errorMessage } from '@murmur/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({}, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

/**
 * Runs `fn` inside BEGIN/COMMIT on one pooled client. Satisfies the domain's
 * `TransactionRunner<PoolClient>`.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      logger.error({ err: errorMessage(rollbackErr) }, 'Rollback failed');
    }
    throw err;
  } finally {
    client.release();
  }
}

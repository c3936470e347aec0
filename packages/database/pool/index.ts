import { Pool } from 'pg';
import { getLogger } from '@kernel/logger';

const logger = getLogger('database:pool');

let poolInstance: Pool | null = null;
let poolInitPromise: Promise<Pool> | null = null;

/**
 * Get the database connection string from environment
 * Lazy validation - only called when connection is needed
 */
export function getConnectionString(): string {
  const connectionString = process.env['CONTROL_PLANE_DB'];

  if (!connectionString) {
    throw new Error(
      'DATABASE_NOT_CONFIGURED: CONTROL_PLANE_DB environment variable is required. ' +
      'Please set it to your PostgreSQL connection string.'
    );
  }

  return connectionString;
}

/**
 * Lazy initialization of the PostgreSQL connection pool.
 * Concurrent callers share one initialization promise.
 */
async function getPool(): Promise<Pool> {
  if (poolInstance) return poolInstance;
  if (poolInitPromise) return poolInitPromise;

  poolInitPromise = (async () => {
    const pool = new Pool({
      connectionString: getConnectionString(),
      // Exports read whole tables; keep a generous but bounded statement timeout
      statement_timeout: 60000,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      keepAlive: true,
    });

    try {
      const client = await pool.connect();
      await client.query('SELECT 1');
      client.release();
      logger.info('Database pool validated successfully');
    } catch (error) {
      poolInitPromise = null;
      await pool.end().catch((endError: unknown) => {
        logger.warn('Failed to close pool after validation error', { error: String(endError) });
      });
      const err = error instanceof Error ? error : new Error(String(error));
      throw new Error(`Failed to validate database connection: ${err.message}`);
    }

    // An idle client error must not crash the process
    pool.on('error', (err) => {
      logger.error('Unexpected pool error', err);
    });

    poolInstance = pool;
    return pool;
  })();

  return poolInitPromise;
}

/**
 * Get the PostgreSQL pool (lazy initialized)
 */
export async function getPoolInstance(): Promise<Pool> {
  return getPool();
}

/**
 * Close the pool if it was ever opened
 */
export async function closePool(): Promise<void> {
  const pool = poolInstance;
  poolInstance = null;
  poolInitPromise = null;
  if (pool) {
    await pool.end();
    logger.info('Database pool closed');
  }
}

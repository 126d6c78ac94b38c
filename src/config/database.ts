import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import { logger } from './logger';
import { env } from './environment';

/**
 * The slice of a pg client the repositories and the store use.
 * A checked-out PoolClient satisfies it.
 */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  release(err?: Error): void;
}

/**
 * Source of transaction clients. A pg Pool satisfies it.
 */
export interface SqlPool {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

// Singleton pool instance
let pool: Pool | null = null;

/**
 * Get or create the PostgreSQL pool (singleton pattern)
 *
 * Every reservation transaction checks out one client for its whole
 * BEGIN..COMMIT span, so the pool size bounds concurrent allocations.
 */
export const getPool = (): Pool => {
  if (!pool) {
    if (!env.DATABASE_URL) {
      throw new Error('DATABASE_URL is not configured');
    }

    pool = new Pool({
      connectionString: env.DATABASE_URL,
      max: env.DB_POOL_MAX,
      connectionTimeoutMillis: 10000,
      idleTimeoutMillis: 30000,
    });

    pool.on('error', (err) => {
      logger.error('PostgreSQL pool error', { error: err.message });
    });

    logger.info('PostgreSQL pool initialized', { max: env.DB_POOL_MAX });
  }

  return pool;
};

/**
 * Test database connection
 */
export const testConnection = async (): Promise<boolean> => {
  try {
    await getPool().query('SELECT 1');
    logger.info('Database connection test successful');
    return true;
  } catch (error) {
    logger.error('Database connection test failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
};

/**
 * Close database connections (for graceful shutdown)
 */
export const closePool = async (): Promise<void> => {
  if (pool) {
    const current = pool;
    pool = null;
    await current.end();
    logger.info('PostgreSQL pool closed');
  }
};

export default getPool;

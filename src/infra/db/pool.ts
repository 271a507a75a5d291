import pg from 'pg';
import type { PoolConfig, QueryResult, QueryResultRow } from 'pg';
import type { Logger } from '../logger.js';

const { Pool } = pg;

/**
 * The slice of `pg.Pool` the repositories use. Lets tests hand in a mock.
 */
export interface Queryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

/**
 * Build the connection pool. Nothing connects until the first query, so a
 * missing database only fails the requests that need it.
 */
export function createPool(config: PoolConfig, logger: Logger): pg.Pool {
  const log = logger.child({ component: 'db' });
  const pool = new Pool(config);

  pool.on('connect', () => {
    log.debug('Database connection established');
  });

  // Idle clients can error (server restart, network drop); without a listener
  // the pool would emit an unhandled 'error' and kill the process.
  pool.on('error', (err) => {
    log.error({ err }, 'Unexpected database error');
  });

  return pool;
}

export function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === '23505'
  );
}

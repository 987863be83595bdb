import { Pool } from 'pg';
import type { PoolClient, QueryResultRow } from 'pg';
import { env } from '../config/env.js';

const connectionString = env.databaseUrl;

export const pool = new Pool({
  connectionString,
  max: 25,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5_000,
});

export type Queryable = Pick<PoolClient, 'query'>;

export const query = async <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params: unknown[] = [],
  client: Queryable = pool,
): Promise<{ rows: T[]; rowCount: number }> => {
  const result = await client.query<T>(text, params);
  return { rows: result.rows, rowCount: result.rowCount ?? 0 };
};

// Runs `fn` inside BEGIN/COMMIT on a dedicated client; any throw rolls back.
export const withTransaction = async <T>(fn: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      console.warn('[db] rollback failed', rollbackError);
    });
    throw error;
  } finally {
    client.release();
  }
};

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

export type QueryParams = ReadonlyArray<unknown>;

export type QueryFn = <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: QueryParams,
) => Promise<{ rows: T[] }>;

export interface SqlExecutor {
  query: QueryFn;
  withTransaction: <T>(fn: (query: QueryFn) => Promise<T>) => Promise<T>;
}

const clientQuery = (client: Pool | PoolClient): QueryFn =>
  async <T extends QueryResultRow = QueryResultRow>(text: string, params: QueryParams = []) => {
    const result = await client.query<T>(text, [...params]);
    return { rows: result.rows };
  };

export const query: QueryFn = clientQuery(pool);

export const withTransaction = async <T>(fn: (query: QueryFn) => Promise<T>): Promise<T> => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(clientQuery(client));
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      console.error('Rollback failed', rollbackError);
    });
    throw error;
  } finally {
    client.release();
  }
};

export const sqlExecutor: SqlExecutor = { query, withTransaction };

import { Pool, QueryResultRow } from 'pg';
import type { AppConfig } from './config';

export type SqlParam = string | number | boolean | null | Date;

/**
 * Minimal query surface shared by the pool, a checked-out client and the
 * in-memory fakes used in tests.
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: SqlParam[]
  ): Promise<{ rows: T[] }>;
}

/** A pool that can hand out a dedicated client for a transaction. */
export interface Database extends Queryable {
  connect(): Promise<Queryable & { release(): void }>;
}

export function createPool(config: AppConfig): Pool {
  return new Pool({
    connectionString: config.DATABASE_URL,
  });
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  db: Queryable,
  text: string,
  params?: SqlParam[]
): Promise<T[]> {
  const result = await db.query<T>(text, params);
  return result.rows;
}

/**
 * Run `fn` on a checked-out client inside a READ ONLY transaction with a
 * statement timeout. The transaction is always rolled back.
 */
export async function withReadOnlyTransaction<T>(
  db: Database,
  statementTimeoutMs: number,
  fn: (client: Queryable) => Promise<T>
): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN READ ONLY');
    // SET does not take bind parameters
    await client.query(`SET LOCAL statement_timeout = ${Math.floor(statementTimeoutMs)}`);
    const result = await fn(client);
    await client.query('ROLLBACK');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

export async function queryOne<T extends QueryResultRow = QueryResultRow>(
  db: Queryable,
  text: string,
  params?: SqlParam[]
): Promise<T | null> {
  const rows = await query<T>(db, text, params);
  return rows[0] ?? null;
}

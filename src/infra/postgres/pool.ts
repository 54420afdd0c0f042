import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";
import { config } from "../../config";
import { mapPgError } from "./errors";

let pool: Pool | null = null;

export function getPool() {
  if (!pool) {
    pool = new Pool({
      connectionString: config.DATABASE_URL,
      max: config.DB_POOL_SIZE,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: config.DB_CONNECTION_TIMEOUT_MS,
      statement_timeout: config.DB_QUERY_TIMEOUT_MS,
      query_timeout: config.DB_QUERY_TIMEOUT_MS
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

export type SqlExecutor = <R extends QueryResultRow>(
  text: string,
  values?: unknown[]
) => Promise<QueryResult<R>>;

export function poolExecutor(db: Pool): SqlExecutor {
  return async <R extends QueryResultRow>(text: string, values?: unknown[]) => {
    try {
      return await db.query<R>(text, values);
    } catch (error) {
      throw mapPgError(error);
    }
  };
}

export function clientExecutor(client: PoolClient): SqlExecutor {
  return async <R extends QueryResultRow>(text: string, values?: unknown[]) => {
    try {
      return await client.query<R>(text, values);
    } catch (error) {
      throw mapPgError(error);
    }
  };
}

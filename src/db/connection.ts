import { Pool, type PoolConfig, type QueryResult, type QueryResultRow } from "pg";
import { parseBoolean } from "../config";

/** The slice of a pg client the repositories use; `Pool` and `PoolClient` both satisfy it. */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
}

export function buildDatabaseConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  const connectionString = env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("DATABASE_URL is required");
  }

  const sslEnabled = parseBoolean(env.DATABASE_SSL, false);
  const rejectUnauthorized = parseBoolean(env.DATABASE_SSL_REJECT_UNAUTHORIZED, true);

  return {
    connectionString,
    ssl: sslEnabled ? { rejectUnauthorized } : undefined
  };
}

export function createDatabasePool(env: NodeJS.ProcessEnv = process.env): Pool {
  return new Pool(buildDatabaseConfig(env));
}

export async function withTransaction<T>(pool: SqlPool, work: (client: SqlClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

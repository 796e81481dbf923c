import pg from 'pg';

/**
 * The slice of pg's Pool the storage layer uses. Tests substitute fakes.
 */
export interface SqlQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface SqlClient extends SqlQueryable {
  release(): void;
}

export interface SqlPool extends SqlQueryable {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

export type PoolFactory = (connectionString: string) => SqlPool;

export function createPgPool(connectionString: string, max = 10): SqlPool {
  const pool = new pg.Pool({ connectionString, max });
  pool.on('error', (error) => {
    console.error('[Postgres] Idle client error:', error);
  });
  return pool;
}

export const defaultPoolFactory: PoolFactory = (connectionString) => createPgPool(connectionString);

/**
 * Run `fn` inside BEGIN/COMMIT on one pooled client, rolling back on error
 */
export async function withTransaction<T>(
  pool: SqlPool,
  fn: (client: SqlQueryable) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      console.error('[Postgres] Rollback failed:', rollbackError);
    }
    throw error;
  } finally {
    client.release();
  }
}

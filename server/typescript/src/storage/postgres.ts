import { isStateOperation, parseOperation, type StateOperation } from '@pagesync/sdk';
import { z } from 'zod';
import type { StorageAdapter } from './interface';
import { createPgPool, withTransaction, type SqlPool } from './pool';

const operationRowSchema = z.object({ operation: z.unknown() });
const documentRowSchema = z.object({ document_id: z.string() });

/**
 * PostgreSQL storage over the page_operations table
 */
export class PostgresStorage implements StorageAdapter {
  private pool: SqlPool;

  constructor(opts: { connectionString?: string; poolMax?: number; pool?: SqlPool }) {
    if (opts.pool) {
      this.pool = opts.pool;
    } else if (opts.connectionString) {
      this.pool = createPgPool(opts.connectionString, opts.poolMax);
    } else {
      throw new Error('PostgresStorage needs a connectionString or a pool');
    }
  }

  async loadOperations(documentId: string): Promise<StateOperation[]> {
    const res = await this.pool.query(
      'SELECT operation FROM page_operations WHERE document_id = $1 ORDER BY id ASC',
      [documentId]
    );

    const operations: StateOperation[] = [];
    for (const row of res.rows) {
      const op = parseOperation(operationRowSchema.parse(row).operation);
      if (op && isStateOperation(op)) {
        operations.push(op);
      } else {
        console.warn(`[Postgres] Skipping unreadable stored operation in ${documentId}`);
      }
    }
    return operations;
  }

  async appendOperations(documentId: string, operations: readonly StateOperation[]): Promise<void> {
    if (operations.length === 0) return;

    const values: string[] = [documentId];
    const rows = operations.map((op) => {
      values.push(JSON.stringify(op));
      return `($1, $${values.length}::jsonb)`;
    });

    await withTransaction(this.pool, async (client) => {
      await client.query(
        `INSERT INTO page_operations (document_id, operation) VALUES ${rows.join(', ')}`,
        values
      );
    });
  }

  async listDocuments(): Promise<string[]> {
    const res = await this.pool.query(
      'SELECT DISTINCT document_id FROM page_operations ORDER BY document_id'
    );
    return res.rows.map((row) => documentRowSchema.parse(row).document_id);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

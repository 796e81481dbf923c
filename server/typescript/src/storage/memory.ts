import type { StateOperation } from '@pagesync/sdk';
import type { StorageAdapter } from './interface';

/**
 * In-process storage, used for development and tests
 */
export class MemoryStorage implements StorageAdapter {
  private logs: Map<string, StateOperation[]> = new Map();

  async loadOperations(documentId: string): Promise<StateOperation[]> {
    return [...(this.logs.get(documentId) ?? [])];
  }

  async appendOperations(documentId: string, operations: readonly StateOperation[]): Promise<void> {
    if (operations.length === 0) return;
    const log = this.logs.get(documentId) ?? [];
    log.push(...operations);
    this.logs.set(documentId, log);
  }

  async listDocuments(): Promise<string[]> {
    return Array.from(this.logs.keys()).sort();
  }

  async close(): Promise<void> {
    this.logs.clear();
  }
}

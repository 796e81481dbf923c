import type { StateOperation } from '@pagesync/sdk';

/**
 * Operation-log persistence
 *
 * A document is stored as its ordered log of accepted state operations.
 * Loading a document replays the log; signals (voice, batch markers) are
 * never stored.
 */
export interface StorageAdapter {
  /**
   * Accepted operations of a document in commit order (empty if unknown)
   */
  loadOperations(documentId: string): Promise<StateOperation[]>;

  /**
   * Append operations after everything stored so far. All or nothing.
   */
  appendOperations(documentId: string, operations: readonly StateOperation[]): Promise<void>;

  /**
   * Ids of every stored document
   */
  listDocuments(): Promise<string[]>;

  /**
   * Release connections
   */
  close(): Promise<void>;
}

import {
  ValidationError,
  ValidationErrorCode,
  PageStore,
  hydrationOperations,
  isStateOperation,
  parsePropValue,
  type Message,
  type Operation,
  type PageSnapshot,
  type Rejection,
  type StateOperation,
  type Unsubscribe,
} from '@pagesync/sdk';
import type { StorageAdapter } from '../storage/interface';
import { createMessageId } from '../websocket/protocol';

/**
 * Document State - one loaded page
 */
export interface DocumentState {
  documentId: string;
  /** Page state, committed to in place */
  store: PageStore;
  subscribers: Set<string>; // Connection IDs subscribed to this document
  lastModified: number;
  /** Tail of the append chain; log order matches commit order */
  persistence: Promise<void>;
  /** Committed operations not yet in storage, oldest first */
  unpersisted: StateOperation[];
}

export type BroadcastListener = (documentId: string, messages: Message[]) => void;

export interface StreamOptions {
  /** Wrap the stream's output in stream.start / stream.end */
  announce?: boolean;
  messageId?: string;
  /** Label used in logs */
  source?: string;
}

export interface StreamSummary {
  applied: number;
  rejected: Rejection[];
}

export type DirectEditResult =
  | { ok: true; operation: StateOperation }
  | { ok: false; error: ValidationError };

/**
 * Stamp the cardinality a rel.set took effect with, so replicas that never
 * saw the type's first edge apply it the same way
 */
function withRegisteredCardinality(op: StateOperation, snapshot: PageSnapshot): StateOperation {
  if (op.t !== 'rel.set' || op.cardinality) return op;
  const cardinality = snapshot.relCardinalities.get(op.type);
  return cardinality ? { ...op, cardinality } : op;
}

/**
 * Producer Stream - one producer's handle for submitting operations
 *
 * Operations outside a batch commit one by one. A batch.start … batch.end
 * run is held back and committed in one synchronous step, so subscribers
 * never see part of it.
 */
export class ProducerStream {
  private batch: StateOperation[] | null = null;
  private closed = false;
  private applied = 0;
  private rejected: Rejection[] = [];

  constructor(
    private readonly coordinator: SyncCoordinator,
    private readonly state: DocumentState,
    private readonly options: StreamOptions & { messageId: string }
  ) {
    if (options.announce) {
      coordinator.broadcast(state.documentId, [{ t: 'stream.start', message_id: options.messageId }]);
    }
  }

  get documentId(): string {
    return this.state.documentId;
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  push(op: Operation): void {
    if (this.closed) {
      throw new Error(`[ProducerStream] Stream ${this.options.messageId} is closed`);
    }

    switch (op.t) {
      case 'batch.start':
        if (this.batch) {
          console.warn(`[ProducerStream] Nested batch.start in ${this.documentId}, ignoring`);
          return;
        }
        this.batch = [];
        return;

      case 'batch.end':
        this.commitBatch();
        return;

      case 'voice':
      case 'escalate':
        this.coordinator.broadcast(this.documentId, [op]);
        return;

      default:
        if (this.batch) {
          this.batch.push(op);
        } else {
          this.record(this.coordinator.commit(this.state, [op], false));
        }
    }
  }

  /**
   * Close the stream, committing an unterminated batch
   */
  end(): StreamSummary {
    if (!this.closed) {
      this.commitBatch();
      this.closed = true;
      if (this.options.announce) {
        this.coordinator.broadcast(this.documentId, [
          { t: 'stream.end', message_id: this.options.messageId },
        ]);
      }
    }
    return { applied: this.applied, rejected: [...this.rejected] };
  }

  /**
   * Close the stream, discarding an unterminated batch
   */
  abort(): void {
    if (this.closed) return;
    if (this.batch && this.batch.length > 0) {
      console.warn(
        `[ProducerStream] Discarding ${this.batch.length} uncommitted operations for ${this.documentId}`
      );
    }
    this.batch = null;
    this.closed = true;
    if (this.options.announce) {
      this.coordinator.broadcast(this.documentId, [
        { t: 'stream.end', message_id: this.options.messageId },
      ]);
    }
  }

  private commitBatch(): void {
    if (!this.batch) return;
    const ops = this.batch;
    this.batch = null;
    this.record(this.coordinator.commit(this.state, ops, true));
  }

  private record(result: { accepted: Operation[]; rejected: Rejection[] }): void {
    this.applied += result.accepted.length;
    for (const rejection of result.rejected) {
      console.warn(
        `[ProducerStream] ${this.options.source ?? 'producer'} rejected ${rejection.operation.t} on ${this.documentId}: ${rejection.error.message}`
      );
    }
    this.rejected.push(...result.rejected);
  }
}

/**
 * Sync Coordinator - owns every loaded document
 *
 * The single writer per document: every producer's operations go through
 * commit(), which is synchronous, so commits never interleave. Accepted
 * operations are fanned out to broadcast listeners in commit order and
 * appended to storage afterwards on a per-document promise chain.
 */
export class SyncCoordinator {
  private documents: Map<string, DocumentState> = new Map();
  private loading: Map<string, Promise<DocumentState>> = new Map();
  private listeners: Set<BroadcastListener> = new Set();
  private storage?: StorageAdapter;

  constructor(options?: { storage?: StorageAdapter }) {
    this.storage = options?.storage;
  }

  /**
   * Get a loaded document, replaying its stored log on first access
   */
  async getDocument(documentId: string): Promise<DocumentState> {
    const existing = this.documents.get(documentId);
    if (existing) return existing;

    let pending = this.loading.get(documentId);
    if (!pending) {
      pending = this.loadDocument(documentId).finally(() => {
        this.loading.delete(documentId);
      });
      this.loading.set(documentId, pending);
    }
    return pending;
  }

  /**
   * Loaded document or throw; for callers that already awaited getDocument
   */
  requireDocument(documentId: string): DocumentState {
    const state = this.documents.get(documentId);
    if (!state) {
      throw new Error(`[Coordinator] Document ${documentId} is not loaded`);
    }
    return state;
  }

  /**
   * Current state of a document. The snapshot is live and keeps changing
   * with later commits.
   */
  async getSnapshot(documentId: string): Promise<PageSnapshot> {
    return (await this.getDocument(documentId)).store.snapshot;
  }

  /**
   * Hydration bracket for a new subscriber
   */
  hydrationMessages(documentId: string): Message[] {
    const { store } = this.requireDocument(documentId);
    return [{ t: 'snapshot.start' }, ...hydrationOperations(store.snapshot), { t: 'snapshot.end' }];
  }

  /**
   * Open a producer stream on a document
   */
  async openStream(documentId: string, options: StreamOptions = {}): Promise<ProducerStream> {
    await this.getDocument(documentId);
    return this.createStream(documentId, options);
  }

  /**
   * Open a producer stream on a document that is already loaded
   */
  createStream(documentId: string, options: StreamOptions = {}): ProducerStream {
    return new ProducerStream(this, this.requireDocument(documentId), {
      ...options,
      messageId: options.messageId ?? createMessageId(),
    });
  }

  /**
   * Apply one prop edit from a client
   *
   * The value is coerced to a prop value first; the update then goes through
   * the same validation as any other producer. On success it is broadcast to
   * every subscriber, the sender included.
   */
  applyDirectEdit(documentId: string, entityId: string, field: string, value: unknown): DirectEditResult {
    const state = this.requireDocument(documentId);
    const coerced = parsePropValue(value);
    if (coerced === null) {
      return {
        ok: false,
        error: new ValidationError(
          `Invalid value for ${entityId}.${field}`,
          ValidationErrorCode.INVALID_VALUE
        ),
      };
    }

    const operation: StateOperation = { t: 'entity.update', ref: entityId, p: { [field]: coerced } };
    const result = this.commit(state, [operation], false);
    const rejection = result.rejected[0];
    if (rejection) {
      return { ok: false, error: rejection.error };
    }
    return { ok: true, operation };
  }

  /**
   * Validate, apply, fan out and persist. Synchronous up to persistence.
   *
   * @internal used by ProducerStream and direct edits
   */
  commit(
    state: DocumentState,
    ops: readonly StateOperation[],
    atomic: boolean
  ): { accepted: StateOperation[]; rejected: Rejection[] } {
    const result = state.store.applyAll(ops);
    const rejected = result.rejected;
    if (result.accepted.length === 0) {
      return { accepted: [], rejected };
    }
    const accepted = result.accepted
      .filter(isStateOperation)
      .map((op) => withRegisteredCardinality(op, state.store.snapshot));

    state.lastModified = Date.now();
    this.broadcast(
      state.documentId,
      atomic ? [{ t: 'batch.start' }, ...accepted, { t: 'batch.end' }] : accepted
    );
    this.persist(state, accepted);
    return { accepted, rejected };
  }

  /**
   * Deliver messages to every broadcast listener
   */
  broadcast(documentId: string, messages: Message[]): void {
    for (const listener of this.listeners) {
      try {
        listener(documentId, messages);
      } catch (error) {
        console.error('[Coordinator] Broadcast listener error:', error);
      }
    }
  }

  onBroadcast(listener: BroadcastListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Subscribe connection to document updates
   */
  subscribe(documentId: string, connectionId: string) {
    this.requireDocument(documentId).subscribers.add(connectionId);
  }

  /**
   * Unsubscribe connection from document
   */
  unsubscribe(documentId: string, connectionId: string) {
    const state = this.documents.get(documentId);
    if (state) {
      state.subscribers.delete(connectionId);
      console.log(`[Coordinator] Connection ${connectionId} unsubscribed from ${documentId}`);
    }
  }

  /**
   * Get subscribers for document
   */
  getSubscribers(documentId: string): string[] {
    const state = this.documents.get(documentId);
    return state ? Array.from(state.subscribers) : [];
  }

  /**
   * Wait for every pending storage append, retrying runs that failed
   */
  async flush(): Promise<void> {
    for (const state of this.documents.values()) {
      if (state.unpersisted.length > 0) this.schedulePersist(state);
    }
    await Promise.all(Array.from(this.documents.values(), (state) => state.persistence));
  }

  /**
   * Get stats
   */
  getStats() {
    return {
      totalDocuments: this.documents.size,
      documents: Array.from(this.documents.values()).map((state) => ({
        id: state.documentId,
        subscribers: state.subscribers.size,
        entities: state.store.snapshot.entities.size,
        sequence: state.store.sequence,
        unpersisted: state.unpersisted.length,
        lastModified: state.lastModified,
      })),
    };
  }

  /**
   * Cleanup - flush pending writes and close storage
   */
  async dispose() {
    await this.flush();
    this.documents.clear();
    this.listeners.clear();

    if (this.storage) {
      try {
        await this.storage.close();
      } catch (error) {
        console.error('[Coordinator] Failed to close storage:', error);
      }
    }
  }

  private async loadDocument(documentId: string): Promise<DocumentState> {
    const stored = this.storage ? await this.storage.loadOperations(documentId) : [];
    const store = new PageStore();
    const result = store.applyAll(stored);
    if (result.rejected.length > 0) {
      console.warn(
        `[Coordinator] ${result.rejected.length} stored operations of ${documentId} no longer apply`
      );
    }

    const state: DocumentState = {
      documentId,
      store,
      subscribers: new Set(),
      lastModified: Date.now(),
      persistence: Promise.resolve(),
      unpersisted: [],
    };
    this.documents.set(documentId, state);
    console.log(`[Coordinator] Loaded ${documentId} (${stored.length} operations)`);
    return state;
  }

  private persist(state: DocumentState, ops: StateOperation[]): void {
    if (!this.storage) return;
    state.unpersisted.push(...ops);
    this.schedulePersist(state);
  }

  private schedulePersist(state: DocumentState): void {
    state.persistence = state.persistence.then(() => this.writeUnpersisted(state));
  }

  /**
   * Append everything not yet stored as one run. A failed run stays at the
   * head of `unpersisted`, so nothing committed after it is written first.
   */
  private async writeUnpersisted(state: DocumentState): Promise<void> {
    const storage = this.storage;
    if (!storage || state.unpersisted.length === 0) return;

    const run = state.unpersisted.slice();
    try {
      await storage.appendOperations(state.documentId, run);
      state.unpersisted.splice(0, run.length);
    } catch (error) {
      console.error(
        `[Coordinator] Failed to persist ${run.length} operations for ${state.documentId}, will retry:`,
        error
      );
    }
  }
}

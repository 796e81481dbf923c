/**
 * Page Replica
 *
 * Client-side copy of a page, driven by a PageSyncClient. Hydration replaces
 * the whole state; live operations and batches are applied in arrival
 * order. Direct edits are shown optimistically until the server echoes the
 * update back or rejects it.
 *
 * @module replica
 */

import { PageSyncError, type PageSnapshot, type PropValue, type StateOperation, type Unsubscribe } from './types'
import { applyAll, type Rejection } from './store/reducer'
import { PageStore } from './store/store'
import type { PageSyncClient } from './websocket/client'
import type { DirectEditErrorMessage } from './websocket/protocol'

interface PendingEdit {
  entityId: string
  field: string
  value: PropValue
}

export class PageReplica {
  private confirmed = new PageStore()
  private view: PageSnapshot = this.confirmed.snapshot
  private pending: PendingEdit[] = []
  private hydrated = false
  private client: PageSyncClient | null = null
  private listeners = new Set<(snapshot: PageSnapshot) => void>()
  private detachers: Unsubscribe[] = []

  /**
   * Follow a channel's events. Replaces any previous attachment.
   */
  attach(client: PageSyncClient): Unsubscribe {
    this.detach()
    this.client = client
    this.detachers = [
      client.on('snapshot', (ops) => this.applySnapshot(ops)),
      client.on('operation', (op) => this.applyOperations([op])),
      client.on('batch', (ops) => this.applyOperations(ops)),
      client.on('directEditError', (error) => this.rejectEdit(error)),
    ]
    return () => this.detach()
  }

  detach(): void {
    this.detachers.forEach((unsubscribe) => unsubscribe())
    this.detachers = []
    this.client = null
  }

  /**
   * Confirmed state with pending optimistic edits layered on top. Without
   * pending edits this is the live confirmed state.
   */
  getSnapshot(): PageSnapshot {
    return this.view
  }

  /** State as last confirmed by the server; live, updated in place */
  getConfirmedSnapshot(): PageSnapshot {
    return this.confirmed.snapshot
  }

  isHydrated(): boolean {
    return this.hydrated
  }

  get pendingEdits(): number {
    return this.pending.length
  }

  subscribe(callback: (snapshot: PageSnapshot) => void): Unsubscribe {
    this.listeners.add(callback)
    return () => {
      this.listeners.delete(callback)
    }
  }

  /**
   * Optimistically set one prop and send the edit to the server
   *
   * @throws {TransportError} when the channel's outbound queue is full
   */
  edit(entityId: string, field: string, value: PropValue): void {
    if (!this.client) {
      throw new PageSyncError('Replica is not attached to a channel', 'NOT_ATTACHED')
    }
    this.client.sendDirectEdit(entityId, field, value)
    this.pending.push({ entityId, field, value })
    this.refresh()
  }

  /** Replace all state with a hydration stream */
  applySnapshot(ops: readonly StateOperation[]): void {
    this.confirmed = new PageStore()
    this.reportRejected(this.confirmed.applyAll(ops).rejected)
    this.pending = []
    this.hydrated = true
    this.refresh()
  }

  /** Apply live operations on top of the confirmed state */
  applyOperations(ops: readonly StateOperation[]): void {
    const result = this.confirmed.applyAll(ops)
    this.reportRejected(result.rejected)
    for (const op of result.accepted) {
      if (op.t === 'entity.update') {
        this.settle(op.ref, Object.keys(op.p))
      }
    }
    this.refresh()
  }

  // ====================
  // Private Methods
  // ====================

  private reportRejected(rejected: readonly Rejection[]): void {
    for (const { operation, error } of rejected) {
      console.warn(`[PageReplica] Server operation ${operation.t} rejected locally:`, error.message)
    }
  }

  private settle(entityId: string, fields: readonly string[]): void {
    const index = this.pending.findIndex(
      (edit) => edit.entityId === entityId && fields.includes(edit.field)
    )
    if (index >= 0) {
      this.pending.splice(index, 1)
    }
  }

  private rejectEdit(error: DirectEditErrorMessage): void {
    const index =
      error.entity_id === undefined
        ? 0
        : this.pending.findIndex((edit) => edit.entityId === error.entity_id)
    if (index >= 0 && index < this.pending.length) {
      this.pending.splice(index, 1)
      this.refresh()
    }
  }

  private refresh(): void {
    this.view =
      this.pending.length === 0
        ? this.confirmed.snapshot
        : applyAll(
            this.confirmed.snapshot,
            this.pending.map(
              (edit): StateOperation => ({
                t: 'entity.update',
                ref: edit.entityId,
                p: { [edit.field]: edit.value },
              })
            )
          ).snapshot

    for (const listener of this.listeners) {
      try {
        listener(this.view)
      } catch (error) {
        console.error('[PageReplica] Listener error:', error)
      }
    }
  }
}

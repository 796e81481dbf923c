/**
 * Shared test fixtures
 */

import { applyAll, emptySnapshot } from '../store/reducer'
import type { PageSnapshot, StateOperation } from '../types'
import type { ClientSocket, SocketFactory, SocketHandlers } from '../websocket/client'
import type { Message } from '../websocket/protocol'

/** page > list > milk, eggs, bread */
export const groceryOps: StateOperation[] = [
  { t: 'entity.create', id: 'page', display: 'page', p: { title: 'Groceries' } },
  { t: 'entity.create', id: 'list', parent: 'page', display: 'list' },
  { t: 'entity.create', id: 'milk', parent: 'list', p: { name: 'Milk', done: false } },
  { t: 'entity.create', id: 'eggs', parent: 'list', p: { name: 'Eggs', done: false } },
  { t: 'entity.create', id: 'bread', parent: 'list', p: { name: 'Bread', done: true } },
]

/**
 * Apply operations to an empty snapshot, failing on any rejection
 */
export function build(ops: readonly StateOperation[] = groceryOps): PageSnapshot {
  const result = applyAll(emptySnapshot(), ops)
  if (result.rejected.length > 0) {
    const first = result.rejected[0]
    throw new Error(`fixture rejected ${first.operation.t}: ${first.error.message}`)
  }
  return result.snapshot
}

/**
 * Deterministic PRNG (mulberry32)
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

// ====================
// Fake Sockets
// ====================

/**
 * In-process stand-in for a client WebSocket, driven by the test
 */
export class FakeSocket implements ClientSocket {
  readonly sent: string[] = []
  closedWith: { code?: number; reason?: string } | null = null
  private open = false

  constructor(
    readonly url: string,
    private readonly handlers: SocketHandlers
  ) {}

  send(data: string): void {
    if (!this.open) {
      throw new Error('socket is not open')
    }
    this.sent.push(data)
  }

  close(code?: number, reason?: string): void {
    this.open = false
    this.closedWith = { code, reason }
  }

  isOpen(): boolean {
    return this.open
  }

  /** Complete the handshake */
  accept(): void {
    this.open = true
    this.handlers.onOpen()
  }

  receive(...messages: Message[]): void {
    for (const message of messages) {
      this.handlers.onMessage(JSON.stringify(message))
    }
  }

  receiveRaw(data: string): void {
    this.handlers.onMessage(data)
  }

  /** Server or network closed the socket */
  drop(code = 1006, reason = ''): void {
    this.open = false
    this.handlers.onClose(code, reason)
  }

  fail(message: string): void {
    this.handlers.onError(new Error(message))
  }

  sentMessages(): unknown[] {
    return this.sent.map((raw): unknown => JSON.parse(raw))
  }
}

export function fakeSocketFactory() {
  const sockets: FakeSocket[] = []
  const factory: SocketFactory = (url, handlers) => {
    const socket = new FakeSocket(url, handlers)
    sockets.push(socket)
    return socket
  }
  const latest = (): FakeSocket => {
    const socket = sockets[sockets.length - 1]
    if (!socket) {
      throw new Error('no socket opened yet')
    }
    return socket
  }
  return { sockets, factory, latest }
}

/** Hydration bracket the server sends for a snapshot */
export function hydration(ops: readonly StateOperation[] = groceryOps): Message[] {
  return [{ t: 'snapshot.start' }, ...ops, { t: 'snapshot.end' }]
}

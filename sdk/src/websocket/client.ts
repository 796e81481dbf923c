/**
 * WebSocket Client
 *
 * Client side of the synchronization channel. Connects to one document,
 * buffers the hydration bracket so it is exposed as a single snapshot,
 * delivers live operations in server commit order and reconnects with
 * exponential backoff. Every reconnect re-hydrates from scratch.
 *
 * @module websocket/client
 */

import WebSocket from 'ws'
import {
  TransportError,
  TransportErrorCode,
  type BatchEndOp,
  type BatchStartOp,
  type EscalateOp,
  type StateOperation,
  type Unsubscribe,
} from '../types'
import { ReconnectionManager, type ReconnectOptions } from '../sync/reconnect'
import {
  frameToString,
  parseMessage,
  serializeMessage,
  type DirectEditErrorMessage,
  type DirectEditMessage,
  type Message,
  type StreamEndMessage,
  type StreamStartMessage,
} from './protocol'

// ====================
// Socket Abstraction
// ====================

export interface SocketHandlers {
  onOpen(): void
  onMessage(data: string): void
  onClose(code: number, reason: string): void
  onError(error: Error): void
}

/** Minimal socket surface the channel needs; tests inject in-process fakes */
export interface ClientSocket {
  send(data: string): void
  close(code?: number, reason?: string): void
  isOpen(): boolean
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => ClientSocket

/** Default factory backed by the `ws` package */
export const createWebSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url)
  ws.on('open', () => handlers.onOpen())
  ws.on('message', (data) => handlers.onMessage(frameToString(data)))
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')))
  ws.on('error', (error) => handlers.onError(error))
  return {
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
    isOpen: () => ws.readyState === WebSocket.OPEN,
  }
}

// ====================
// Configuration Types
// ====================

export interface PageSyncClientConfig {
  /** Full WebSocket URL of the document, e.g. ws://host:8080/ws/my_doc */
  url: string

  /** Reconnection configuration */
  reconnect?: ReconnectOptions & {
    /** Enable automatic reconnection (default: true) */
    enabled?: boolean
  }

  /** Outbound messages held while not live (default: 1000) */
  maxQueueSize?: number

  socketFactory?: SocketFactory
}

// ====================
// State & Event Types
// ====================

export type ChannelState =
  | 'disconnected'
  | 'connecting'
  | 'hydrating'
  | 'live'
  | 'reconnecting'
  | 'failed'

export interface ChannelEvents {
  /** Hydration completed: the full ordered operation list, replaces prior state */
  snapshot: StateOperation[]
  /** One live state operation */
  operation: StateOperation
  /** A batch bracket, delivered atomically */
  batch: StateOperation[]
  voice: string
  /** A producer asked to hand the turn to a stronger model */
  escalate: EscalateOp
  status: StreamStartMessage | StreamEndMessage
  directEditError: DirectEditErrorMessage
  state: ChannelState
  transportError: TransportError
}

type Handler<T> = (payload: T) => void

type HandlerSets = { [K in keyof ChannelEvents]: Set<Handler<ChannelEvents[K]>> }

export type ClientMessage = StateOperation | BatchStartOp | BatchEndOp | DirectEditMessage

// ====================
// Page Sync Client
// ====================

export class PageSyncClient {
  private socket: ClientSocket | null = null
  /** Incremented per socket; events from older sockets are ignored */
  private generation = 0
  private _state: ChannelState = 'disconnected'

  private hydrationBuffer: StateOperation[] = []
  private batchBuffer: StateOperation[] | null = null
  private outbound: ClientMessage[] = []

  private readonly reconnection: ReconnectionManager
  private readonly reconnectEnabled: boolean
  private readonly maxQueueSize: number
  private readonly socketFactory: SocketFactory

  private readonly handlers: HandlerSets = {
    snapshot: new Set(),
    operation: new Set(),
    batch: new Set(),
    voice: new Set(),
    escalate: new Set(),
    status: new Set(),
    directEditError: new Set(),
    state: new Set(),
    transportError: new Set(),
  }

  constructor(private readonly config: PageSyncClientConfig) {
    const { enabled = true, ...backoff }: NonNullable<PageSyncClientConfig['reconnect']> =
      config.reconnect ?? {}
    this.reconnectEnabled = enabled
    this.reconnection = new ReconnectionManager(backoff)
    this.maxQueueSize = config.maxQueueSize ?? 1000
    this.socketFactory = config.socketFactory ?? createWebSocket
  }

  get state(): ChannelState {
    return this._state
  }

  /** Messages waiting for the next hydration to complete */
  get queuedCount(): number {
    return this.outbound.length
  }

  isLive(): boolean {
    return this._state === 'live'
  }

  /**
   * Open the channel. No-op unless disconnected or failed.
   */
  connect(): void {
    if (this._state !== 'disconnected' && this._state !== 'failed') {
      return
    }
    this.reconnection.succeeded()
    this.open()
  }

  /**
   * Close the channel and cancel any pending reconnect
   */
  disconnect(): void {
    this.reconnection.cancel()
    this.generation += 1
    const socket = this.socket
    this.socket = null
    this.resetBuffers()
    if (socket) {
      socket.close(1000, 'client disconnect')
    }
    this.setState('disconnected')
  }

  /**
   * Send a message to the server. Queued until the channel is live.
   *
   * @throws {TransportError} QUEUE_FULL when the outbound queue is full
   */
  send(message: ClientMessage): void {
    if (this.socket && this._state === 'live' && this.socket.isOpen()) {
      try {
        this.socket.send(serializeMessage(message))
        return
      } catch (error) {
        console.error('[PageSyncClient] Send failed, queueing:', error)
      }
    }
    this.enqueue(message)
  }

  /**
   * Edit one prop of an entity. Rejections arrive as `directEditError`.
   */
  sendDirectEdit(entityId: string, field: string, value: unknown): void {
    this.send({ t: 'direct_edit', entity_id: entityId, field, value })
  }

  on<K extends keyof ChannelEvents>(event: K, handler: Handler<ChannelEvents[K]>): Unsubscribe {
    const set = this.handlers[event]
    set.add(handler)
    return () => {
      set.delete(handler)
    }
  }

  // ====================
  // Private Methods
  // ====================

  private open(): void {
    this.generation += 1
    const generation = this.generation
    const current = () => generation === this.generation

    this.setState('connecting')

    try {
      this.socket = this.socketFactory(this.config.url, {
        onOpen: () => {
          if (current()) this.handleOpen()
        },
        onMessage: (data) => {
          if (current()) this.handleRaw(data)
        },
        onClose: (code, reason) => {
          if (!current()) return
          console.log(`[PageSyncClient] Socket closed: ${code} ${reason}`)
          this.handleSocketLost(
            new TransportError(`Socket closed (${code})`, TransportErrorCode.SOCKET_CLOSED)
          )
        },
        onError: (error) => {
          if (!current()) return
          console.error('[PageSyncClient] Socket error:', error.message)
          const code =
            this._state === 'connecting'
              ? TransportErrorCode.CONNECT_FAILED
              : TransportErrorCode.SOCKET_CLOSED
          this.handleSocketLost(new TransportError(error.message, code))
        },
      })
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.handleSocketLost(
        new TransportError(`Failed to create socket: ${message}`, TransportErrorCode.CONNECT_FAILED)
      )
    }
  }

  private handleOpen(): void {
    this.reconnection.succeeded()
    this.resetBuffers()
    this.setState('hydrating')
  }

  private handleRaw(data: string): void {
    const message = parseMessage(data)
    if (message) {
      this.handleMessage(message)
    }
  }

  private handleMessage(message: Message): void {
    switch (message.t) {
      case 'snapshot.start':
        this.resetBuffers()
        this.setState('hydrating')
        return

      case 'snapshot.end': {
        if (this._state !== 'hydrating') {
          console.warn('[PageSyncClient] snapshot.end outside hydration, ignoring')
          return
        }
        const ops = this.hydrationBuffer
        this.hydrationBuffer = []
        this.emit('snapshot', ops)
        this.setState('live')
        this.flushOutbound()
        return
      }

      case 'voice':
        this.emit('voice', message.text)
        return

      case 'escalate':
        this.emit('escalate', message)
        return

      case 'stream.start':
      case 'stream.end':
        this.emit('status', message)
        return

      case 'direct_edit.error':
        this.emit('directEditError', message)
        return

      case 'direct_edit':
        console.warn('[PageSyncClient] Unexpected direct_edit from server, ignoring')
        return

      case 'batch.start':
        if (this._state === 'live') {
          this.batchBuffer = []
        }
        return

      case 'batch.end':
        if (this._state === 'live' && this.batchBuffer) {
          const ops = this.batchBuffer
          this.batchBuffer = null
          this.emit('batch', ops)
        }
        return

      default:
        if (this._state === 'hydrating') {
          this.hydrationBuffer.push(message)
        } else if (this._state === 'live') {
          if (this.batchBuffer) {
            this.batchBuffer.push(message)
          } else {
            this.emit('operation', message)
          }
        }
    }
  }

  private handleSocketLost(error: TransportError): void {
    this.generation += 1
    const socket = this.socket
    this.socket = null
    this.resetBuffers()
    if (socket && socket.isOpen()) {
      socket.close(1000, 'reconnecting')
    }

    this.emit('transportError', error)

    if (this._state === 'disconnected') {
      return
    }
    if (!this.reconnectEnabled) {
      this.setState('disconnected')
      return
    }

    this.setState('reconnecting')
    const delay = this.reconnection.schedule(() => this.open())
    if (delay === null) {
      this.setState('failed')
    }
  }

  private resetBuffers(): void {
    this.hydrationBuffer = []
    this.batchBuffer = null
  }

  private enqueue(message: ClientMessage): void {
    if (this.outbound.length >= this.maxQueueSize) {
      throw new TransportError(
        `Message queue full (${this.maxQueueSize} messages)`,
        TransportErrorCode.QUEUE_FULL
      )
    }
    this.outbound.push(message)
  }

  private flushOutbound(): void {
    while (this.outbound.length > 0 && this.socket && this.isLive() && this.socket.isOpen()) {
      const message = this.outbound[0]
      try {
        this.socket.send(serializeMessage(message))
      } catch (error) {
        console.error('[PageSyncClient] Failed to send queued message:', error)
        break
      }
      this.outbound.shift()
    }
  }

  private setState(state: ChannelState): void {
    if (this._state === state) {
      return
    }
    this._state = state
    this.emit('state', state)
  }

  private emit<K extends keyof ChannelEvents>(event: K, payload: ChannelEvents[K]): void {
    for (const handler of this.handlers[event]) {
      try {
        handler(payload)
      } catch (error) {
        console.error(`[PageSyncClient] ${event} handler error:`, error)
      }
    }
  }
}

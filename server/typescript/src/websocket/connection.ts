import WebSocket from 'ws';
import type { Message } from '@pagesync/sdk';
import { decodeFrame, encodeMessage, frameToString } from './protocol';

/**
 * Socket surface a Connection drives. `wrapWebSocket` adapts a ws socket;
 * tests provide in-process fakes.
 */
export interface ServerSocket {
  readonly bufferedAmount: number;
  readonly isOpen: boolean;
  send(data: string, callback: (error?: Error) => void): void;
  close(code: number, reason: string): void;
  ping(): void;
  terminate(): void;
  onMessage(handler: (data: string) => void): void;
  onClose(handler: (code: number, reason: string) => void): void;
  onError(handler: (error: Error) => void): void;
  onPong(handler: () => void): void;
}

export function wrapWebSocket(ws: WebSocket): ServerSocket {
  return {
    get bufferedAmount() {
      return ws.bufferedAmount;
    },
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (data, callback) => ws.send(data, callback),
    close: (code, reason) => ws.close(code, reason),
    ping: () => ws.ping(),
    terminate: () => ws.terminate(),
    onMessage: (handler) => {
      ws.on('message', (data, isBinary) => {
        if (isBinary) {
          console.warn('[Connection] Ignoring binary frame');
          return;
        }
        handler(frameToString(data));
      });
    },
    onClose: (handler) => {
      ws.on('close', (code, reason) => handler(code, reason.toString('utf8')));
    },
    onError: (handler) => {
      ws.on('error', handler);
    },
    onPong: (handler) => {
      ws.on('pong', handler);
    },
  };
}

export enum ConnectionState {
  OPEN = 'open',
  CLOSING = 'closing',
  CLOSED = 'closed',
}

/** Close code sent when a client cannot keep up with its outbound queue */
export const CLOSE_QUEUE_OVERFLOW = 1013;

export interface ConnectionOptions {
  /**
   * Units held for the socket before the connection is dropped. A unit is
   * one `send` or one `sendAll` call: a commit, a batch or a hydration
   * bracket, however many frames it carries.
   */
  queueLimit?: number;
  /** Socket buffer size above which draining pauses */
  highWaterMark?: number;
}

interface ConnectionEvents {
  message: Message;
  close: { code: number; reason: string };
}

type HandlerSets = { [K in keyof ConnectionEvents]: Set<(payload: ConnectionEvents[K]) => void> };

/**
 * Connection - one client socket
 *
 * Outbound messages go through a bounded queue drained asynchronously, so a
 * slow client never blocks a commit. The bound counts atomic units, not
 * frames. When the queue overflows the client is dropped; it re-hydrates on
 * reconnect.
 */
export class Connection {
  state = ConnectionState.OPEN;
  documentId?: string;

  private queue: string[][] = [];
  private frames = 0;
  private pumpScheduled = false;
  private awaitingDrain = false;
  private alive = true;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private readonly queueLimit: number;
  private readonly highWaterMark: number;
  private handlers: HandlerSets = { message: new Set(), close: new Set() };

  constructor(
    private readonly socket: ServerSocket,
    public readonly id: string,
    options: ConnectionOptions = {}
  ) {
    this.queueLimit = options.queueLimit ?? 1000;
    this.highWaterMark = options.highWaterMark ?? 1024 * 1024;

    socket.onMessage((data) => {
      const message = decodeFrame(data);
      if (message) this.emit('message', message);
    });
    socket.onClose((code, reason) => this.handleClose(code, reason));
    socket.onError((error) => {
      console.error(`[Connection] ${this.id} socket error:`, error.message);
    });
    socket.onPong(() => {
      this.alive = true;
    });
  }

  /** Frames waiting to be written */
  get queued(): number {
    return this.frames;
  }

  /**
   * Queue one message for delivery
   *
   * @returns false when the connection is closing or was dropped for overflow
   */
  send(message: Message): boolean {
    return this.sendAll([message]);
  }

  /**
   * Queue messages in order as one unit. The unit counts once against the
   * queue limit.
   *
   * @returns false when the connection is closing or was dropped for overflow
   */
  sendAll(messages: readonly Message[]): boolean {
    if (this.state !== ConnectionState.OPEN) return false;
    if (messages.length === 0) return true;

    if (this.queue.length >= this.queueLimit) {
      console.warn(
        `[Connection] ${this.id} outbound queue overflow (${this.queueLimit}), dropping connection`
      );
      this.close(CLOSE_QUEUE_OVERFLOW, 'Outbound queue overflow');
      return false;
    }

    this.queue.push(messages.map(encodeMessage));
    this.frames += messages.length;
    this.schedulePump();
    return true;
  }

  on<K extends keyof ConnectionEvents>(
    event: K,
    handler: (payload: ConnectionEvents[K]) => void
  ): () => void {
    const set = this.handlers[event];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  /**
   * Ping every `interval` ms; terminate if the previous ping got no pong
   */
  startHeartbeat(interval: number): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      if (!this.alive) {
        console.warn(`[Connection] ${this.id} missed heartbeat, terminating`);
        this.stopHeartbeat();
        this.socket.terminate();
        return;
      }
      this.alive = false;
      this.socket.ping();
    }, interval);
  }

  stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  close(code = 1000, reason = ''): void {
    if (this.state !== ConnectionState.OPEN) return;
    this.state = ConnectionState.CLOSING;
    this.clearQueue();
    this.stopHeartbeat();
    this.socket.close(code, reason);
  }

  private schedulePump(): void {
    if (this.pumpScheduled || this.awaitingDrain) return;
    this.pumpScheduled = true;
    setImmediate(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (this.queue.length > 0 && this.state === ConnectionState.OPEN && this.socket.isOpen) {
      if (this.socket.bufferedAmount >= this.highWaterMark) {
        this.awaitingDrain = true;
        return;
      }
      const unit = this.queue[0];
      const frame = unit.shift();
      if (unit.length === 0) this.queue.shift();
      if (frame === undefined) continue;
      this.frames -= 1;
      this.socket.send(frame, (error) => this.handleSent(error));
    }
  }

  private clearQueue(): void {
    this.queue = [];
    this.frames = 0;
  }

  private handleSent(error?: Error): void {
    if (error) {
      console.error(`[Connection] ${this.id} send failed:`, error.message);
      return;
    }
    if (this.awaitingDrain) {
      this.awaitingDrain = false;
      this.schedulePump();
    }
  }

  private handleClose(code: number, reason: string): void {
    if (this.state === ConnectionState.CLOSED) return;
    this.state = ConnectionState.CLOSED;
    this.clearQueue();
    this.stopHeartbeat();
    this.emit('close', { code, reason });
  }

  private emit<K extends keyof ConnectionEvents>(event: K, payload: ConnectionEvents[K]): void {
    for (const handler of this.handlers[event]) {
      try {
        handler(payload);
      } catch (error) {
        console.error(`[Connection] ${this.id} ${event} handler error:`, error);
      }
    }
  }
}

import type { ServerSocket } from '../src/websocket/connection';
import type { SqlClient, SqlPool } from '../src/storage/pool';

/**
 * Let queued setImmediate callbacks and promise chains run
 */
export async function settle(rounds = 3): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * In-process stand-in for a ws socket on the server side
 *
 * With `autoFlush` off, sends accumulate in `bufferedAmount` and their
 * callbacks wait for `flush()`, like a client that reads slowly.
 */
export class FakeServerSocket implements ServerSocket {
  bufferedAmount = 0;
  isOpen = true;
  autoFlush = true;
  pings = 0;
  terminated = false;
  closedWith: { code: number; reason: string } | null = null;
  readonly sent: string[] = [];

  private pendingCallbacks: Array<(error?: Error) => void> = [];
  private messageHandlers: Array<(data: string) => void> = [];
  private closeHandlers: Array<(code: number, reason: string) => void> = [];
  private errorHandlers: Array<(error: Error) => void> = [];
  private pongHandlers: Array<() => void> = [];

  send(data: string, callback: (error?: Error) => void): void {
    this.sent.push(data);
    if (this.autoFlush) {
      callback();
    } else {
      this.bufferedAmount += data.length;
      this.pendingCallbacks.push(callback);
    }
  }

  close(code: number, reason: string): void {
    if (!this.isOpen) return;
    this.closedWith = { code, reason };
    this.emitClose(code, reason);
  }

  ping(): void {
    this.pings++;
  }

  terminate(): void {
    this.terminated = true;
    this.emitClose(1006, '');
  }

  onMessage(handler: (data: string) => void): void {
    this.messageHandlers.push(handler);
  }

  onClose(handler: (code: number, reason: string) => void): void {
    this.closeHandlers.push(handler);
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandlers.push(handler);
  }

  onPong(handler: () => void): void {
    this.pongHandlers.push(handler);
  }

  // Test drivers

  receive(...messages: unknown[]): void {
    for (const message of messages) {
      this.receiveRaw(JSON.stringify(message));
    }
  }

  receiveRaw(data: string): void {
    this.messageHandlers.forEach((handler) => handler(data));
  }

  pong(): void {
    this.pongHandlers.forEach((handler) => handler());
  }

  fail(error: Error): void {
    this.errorHandlers.forEach((handler) => handler(error));
  }

  /** Client went away */
  drop(code = 1001, reason = ''): void {
    this.emitClose(code, reason);
  }

  /** Deliver everything buffered and run the send callbacks */
  flush(): void {
    this.bufferedAmount = 0;
    const callbacks = this.pendingCallbacks;
    this.pendingCallbacks = [];
    callbacks.forEach((callback) => callback());
  }

  sentMessages(): unknown[] {
    return this.sent.map((raw): unknown => JSON.parse(raw));
  }

  /** Forget what was sent so far */
  clearSent(): void {
    this.sent.length = 0;
  }

  private emitClose(code: number, reason: string): void {
    if (!this.isOpen) return;
    this.isOpen = false;
    this.closeHandlers.forEach((handler) => handler(code, reason));
  }
}

export interface RecordedQuery {
  text: string;
  values?: unknown[];
  /** 'pool' or the index of the client that ran it */
  via: 'pool' | number;
}

export type QueryResponder = (text: string, values?: unknown[]) => unknown[];

/**
 * In-process SqlPool that records every statement
 */
export class FakePool implements SqlPool {
  readonly queries: RecordedQuery[] = [];
  released = 0;
  ended = false;
  private clients = 0;

  constructor(private readonly respond: QueryResponder = () => []) {}

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    return this.run(text, values, 'pool');
  }

  async connect(): Promise<SqlClient> {
    const index = this.clients++;
    return {
      query: async (text: string, values?: unknown[]) => this.run(text, values, index),
      release: () => {
        this.released++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  texts(): string[] {
    return this.queries.map((q) => q.text.trim());
  }

  private run(text: string, values: unknown[] | undefined, via: 'pool' | number): { rows: unknown[] } {
    this.queries.push({ text, values, via });
    return { rows: this.respond(text, values) };
  }
}

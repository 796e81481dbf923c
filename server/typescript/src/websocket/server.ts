import { WebSocketServer } from 'ws';
import type { Server } from 'http';
import type { Message } from '@pagesync/sdk';
import { Connection, ConnectionState, wrapWebSocket, type ServerSocket } from './connection';
import { ConnectionRegistry } from './registry';
import type { ProducerStream, SyncCoordinator } from '../sync/coordinator';

export interface SyncServerOptions {
  maxConnections?: number;
  heartbeatInterval?: number;
  queueLimit?: number;
  highWaterMark?: number;
}

const DOCUMENT_PATH = /^\/ws\/([A-Za-z0-9_-]{1,128})\/?$/;

/**
 * Document id from a `/ws/<documentId>` request path
 */
export function parseDocumentPath(url: string | undefined): string | null {
  if (!url) return null;
  const { pathname } = new URL(url, 'http://localhost');
  const match = DOCUMENT_PATH.exec(pathname);
  return match?.[1] ?? null;
}

/**
 * WebSocket Server
 *
 * Attaches to the HTTP server and runs the server side of the channel:
 * - Hydration bracket on connect, then live fan-out in commit order
 * - Client operations through a per-connection producer stream
 * - Direct edits, with rejections sent to the sender only
 * - Heartbeat and connection limits
 */
export class SyncWebSocketServer {
  private wss: WebSocketServer | null = null;
  private registry: ConnectionRegistry = new ConnectionRegistry();
  private streams: Map<string, ProducerStream> = new Map();
  private connectionCounter = 0;
  private readonly options: Required<SyncServerOptions>;
  private readonly stopFanOut: () => void;

  constructor(
    private readonly coordinator: SyncCoordinator,
    options: SyncServerOptions = {}
  ) {
    this.options = {
      maxConnections: options.maxConnections ?? 10000,
      heartbeatInterval: options.heartbeatInterval ?? 30000,
      queueLimit: options.queueLimit ?? 1000,
      highWaterMark: options.highWaterMark ?? 1024 * 1024,
    };
    this.stopFanOut = coordinator.onBroadcast((documentId, messages) =>
      this.fanOut(documentId, messages)
    );
  }

  /**
   * Accept WebSocket upgrades on an HTTP server
   */
  attach(server: Server): void {
    const wss = new WebSocketServer({ server });
    this.wss = wss;

    wss.on('connection', (ws, request) => {
      const socket = wrapWebSocket(ws);
      const documentId = parseDocumentPath(request.url);
      if (!documentId) {
        socket.close(1008, 'Expected /ws/<documentId>');
        return;
      }
      this.handleConnection(socket, documentId).catch((error: unknown) => {
        console.error('[Server] Connection setup failed:', error);
      });
    });

    wss.on('error', (error) => {
      console.error('[Server] WebSocket server error:', error);
    });
  }

  /**
   * Set up one client socket following `documentId`
   *
   * @returns the connection, or null if it was refused or closed while loading
   */
  async handleConnection(socket: ServerSocket, documentId: string): Promise<Connection | null> {
    if (this.registry.count() >= this.options.maxConnections) {
      socket.close(1008, 'Server at maximum capacity');
      return null;
    }

    const connection = new Connection(socket, `conn-${++this.connectionCounter}`, {
      queueLimit: this.options.queueLimit,
      highWaterMark: this.options.highWaterMark,
    });
    connection.documentId = documentId;
    this.registry.add(connection);
    console.log(`[Server] New connection ${connection.id} on ${documentId} (total: ${this.registry.count()})`);

    connection.on('close', () => this.handleDisconnect(connection));

    const load = this.coordinator.getDocument(documentId);

    // Messages are handled in arrival order, once the document is loaded
    let chain: Promise<void> = load.then(
      () => undefined,
      () => undefined
    );
    connection.on('message', (message) => {
      chain = chain
        .then(() => this.handleMessage(connection, message))
        .catch((error: unknown) => {
          console.error(`[Server] Failed to handle ${message.t} from ${connection.id}:`, error);
        });
    });

    try {
      await load;
    } catch (error) {
      console.error(`[Server] Failed to load ${documentId}:`, error);
      connection.close(1011, 'Failed to load document');
      return null;
    }

    if (connection.state !== ConnectionState.OPEN) {
      return null;
    }

    // Hydrate and subscribe in one synchronous step so no commit falls between
    connection.sendAll(this.coordinator.hydrationMessages(documentId));
    this.coordinator.subscribe(documentId, connection.id);
    this.streams.set(
      connection.id,
      this.coordinator.createStream(documentId, { source: connection.id })
    );
    connection.startHeartbeat(this.options.heartbeatInterval);

    return connection;
  }

  /**
   * Handle incoming message from client
   */
  private handleMessage(connection: Connection, message: Message): void {
    const documentId = connection.documentId;
    if (!documentId || connection.state !== ConnectionState.OPEN) return;

    switch (message.t) {
      case 'direct_edit': {
        const result = this.coordinator.applyDirectEdit(
          documentId,
          message.entity_id,
          message.field,
          message.value
        );
        if (!result.ok) {
          console.warn(`[Server] Direct edit from ${connection.id} rejected: ${result.error.message}`);
          connection.send({
            t: 'direct_edit.error',
            error: result.error.message,
            code: result.error.code,
            entity_id: message.entity_id,
          });
        }
        return;
      }

      case 'snapshot.start':
      case 'snapshot.end':
      case 'stream.start':
      case 'stream.end':
      case 'direct_edit.error':
      case 'meta.update':
      case 'style.set':
      case 'style.entity':
      case 'meta.annotate':
      case 'meta.constrain':
      case 'rel.constrain':
      case 'voice':
      case 'escalate':
        console.warn(`[Server] Ignoring server-only message ${message.t} from ${connection.id}`);
        return;

      default: {
        const stream = this.streams.get(connection.id);
        if (stream) {
          stream.push(message);
        }
      }
    }
  }

  /**
   * Deliver committed messages to every subscriber of a document
   */
  private fanOut(documentId: string, messages: Message[]): void {
    for (const connectionId of this.coordinator.getSubscribers(documentId)) {
      this.registry.get(connectionId)?.sendAll(messages);
    }
  }

  /**
   * Handle connection disconnect
   */
  private handleDisconnect(connection: Connection) {
    console.log(`[Server] Connection ${connection.id} disconnected`);
    if (connection.documentId) {
      this.coordinator.unsubscribe(connection.documentId, connection.id);
    }
    const stream = this.streams.get(connection.id);
    if (stream) {
      stream.abort();
      this.streams.delete(connection.id);
    }
  }

  /**
   * Get server statistics
   */
  getStats() {
    return {
      connections: this.registry.getMetrics(),
      documents: this.coordinator.getStats(),
    };
  }

  /**
   * Graceful shutdown
   */
  async close(): Promise<void> {
    console.log('[Server] Closing WebSocket server...');

    this.stopFanOut();
    this.registry.closeAll(1001, 'Server shutdown');
    for (const stream of this.streams.values()) {
      stream.abort();
    }
    this.streams.clear();

    const wss = this.wss;
    if (!wss) return;
    this.wss = null;
    await new Promise<void>((resolve) => {
      wss.close(() => resolve());
    });
  }
}

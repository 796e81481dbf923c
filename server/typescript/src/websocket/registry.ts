import { Connection, ConnectionState } from './connection';

/**
 * Connection Registry - live connections by id
 *
 * Connections remove themselves when their socket closes.
 */
export class ConnectionRegistry {
  private connections: Map<string, Connection> = new Map();
  private totalAccepted = 0;

  add(connection: Connection): void {
    this.connections.set(connection.id, connection);
    this.totalAccepted++;
    connection.on('close', () => this.remove(connection.id));
  }

  remove(connectionId: string): void {
    this.connections.delete(connectionId);
  }

  get(connectionId: string): Connection | undefined {
    return this.connections.get(connectionId);
  }

  count(): number {
    return this.connections.size;
  }

  getMetrics() {
    let queued = 0;
    let open = 0;
    for (const connection of this.connections.values()) {
      queued += connection.queued;
      if (connection.state === ConnectionState.OPEN) open++;
    }
    return {
      totalConnections: this.connections.size,
      openConnections: open,
      totalAccepted: this.totalAccepted,
      queuedMessages: queued,
    };
  }

  closeAll(code: number, reason: string): void {
    for (const connection of Array.from(this.connections.values())) {
      connection.close(code, reason);
    }
  }
}

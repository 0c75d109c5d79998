import { EventEmitter } from "events";
import { Connection, type ByteStream, type ConnectionOptions } from "./connection.js";

/**
 * ConnectionManager tracks all active connections.
 *
 * Responsibilities:
 * - Assign unique connection IDs
 * - Track active connections
 * - Handle connection cleanup
 * - Provide connection lookup
 */
export class ConnectionManager extends EventEmitter {
  private connections: Map<string, Connection> = new Map();
  private nextId: number = 1;

  constructor(private readonly options: ConnectionOptions) {
    super();
  }

  /**
   * Create a new connection from a byte stream
   */
  createConnection(stream: ByteStream): Connection {
    const connectionId = this.generateId();
    const connection = new Connection(stream, connectionId, this.options);

    this.connections.set(connectionId, connection);

    // Wire up cleanup
    connection.on("close", () => {
      this.connections.delete(connectionId);
      this.emit("connectionClosed", connectionId);
    });

    this.emit("connectionCreated", connection);

    return connection;
  }

  /**
   * Get a connection by ID
   */
  getConnection(connectionId: string): Connection | undefined {
    return this.connections.get(connectionId);
  }

  /**
   * Get all active connections
   */
  getAllConnections(): Connection[] {
    return Array.from(this.connections.values());
  }

  /**
   * Get connection count
   */
  getConnectionCount(): number {
    return this.connections.size;
  }

  /**
   * Number of connections whose session has logged in
   */
  getAuthenticatedCount(): number {
    return this.getAllConnections().filter((c) => c.session.isAuthenticated())
      .length;
  }

  /**
   * Close all connections
   */
  closeAll(): void {
    for (const connection of this.connections.values()) {
      connection.close();
    }
  }

  /**
   * Generate a unique connection ID
   */
  private generateId(): string {
    return `conn-${this.nextId++}`;
  }
}

import { createServer, Server as NetServer, type Socket } from "net";
import { ConnectionManager } from "../../../packages/transport/src/connection/connectionManager.js";
import {
  Connection,
  ConnectionState,
  type ByteStream,
  type ConnectionError,
} from "../../../packages/transport/src/connection/connection.js";
import type { SessionState } from "../../../packages/transport/src/session/session.js";
import { MessageType } from "../../../packages/protocol/src/constants.js";
import type { Message } from "../../../packages/protocol/src/types.js";
import type { ProtocolError } from "../../../packages/protocol/src/errors.js";
import { handleLogin } from "./handlers/login.js";
import { handleSubmitOrder } from "./handlers/submitOrder.js";
import { handleHeartbeat } from "./handlers/heartbeat.js";
import type { GatewayContext } from "./handlers/context.js";
import { StaticTokenVerifier, type TokenVerifier } from "./auth/tokenVerifier.js";
import { SymbolWhitelistSink, type OrderSink } from "./orders/orderSink.js";
import { config, type GatewayConfig } from "./config.js";
import { logger } from "./observability/logger.js";
import { metrics } from "./observability/metrics.js";

export interface GatewayOptions {
  config?: GatewayConfig;
  verifier?: TokenVerifier;
  sink?: OrderSink;
}

/**
 * Order Gateway TCP Server
 *
 * Core responsibilities:
 * - Accept TCP connections
 * - Wire up server-role Connection instances
 * - Route decoded messages to handlers
 * - Drop per-connection state on close
 */
export class GatewayServer {
  private server: NetServer;
  private connectionManager: ConnectionManager;
  private config: GatewayConfig;
  private context: GatewayContext;

  constructor(options: GatewayOptions = {}) {
    this.config = options.config ?? config;
    this.context = {
      verifier: options.verifier ?? new StaticTokenVerifier(this.config.tokens),
      sink: options.sink ?? new SymbolWhitelistSink(this.config.symbols),
      users: new Map(),
    };
    this.connectionManager = new ConnectionManager({
      role: "server",
      maxFrameSize: this.config.maxFrameSize,
      idleTimeoutMs: this.config.idleTimeout,
    });
    this.server = createServer((socket) => this.handleSocket(socket));
  }

  /**
   * Start the server
   */
  start(): Promise<void> {
    return new Promise((resolve) => {
      this.server.listen(this.config.port, this.config.host, () => {
        logger.info(
          `Order gateway listening on ${this.config.host}:${this.config.port}`
        );
        if (this.config.tokens.size === 0) {
          logger.warn("No AUTH_TOKENS configured, every login will be rejected");
        }
        if (this.config.debug) {
          logger.info("Debug mode enabled (ORDERWIRE_DEBUG=1)");
        }
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      logger.info("Shutting down order gateway...");

      // Print metrics before shutdown
      metrics.print();

      // Close all connections
      this.connectionManager.closeAll();

      // Close server
      this.server.close((err) => {
        if (err) {
          reject(err);
        } else {
          logger.info("Server stopped");
          resolve();
        }
      });
    });
  }

  /**
   * Handle new socket connection
   */
  private handleSocket(socket: Socket): void {
    logger.debug("Accepted socket", { remoteAddress: socket.remoteAddress });
    this.accept(socket);
  }

  /**
   * Wire a byte stream into the gateway
   */
  accept(stream: ByteStream): Connection {
    const connection = this.connectionManager.createConnection(stream);
    const id = connection.connectionId;

    metrics.connectionOpened();
    logger.connection(id, "Connected");

    connection.on("message", (message: Message) => {
      logger.message(id, "←", message);
      this.handleMessage(connection, message);
    });

    connection.on("session", (next: SessionState, previous: SessionState) => {
      logger.stateTransition(id, previous, next);
    });

    connection.on("state", (state: ConnectionState) => {
      if (state === ConnectionState.DRAINING) {
        logger.backpressure(id, "detected");
      } else if (state === ConnectionState.OPEN) {
        logger.backpressure(id, "relieved");
      }
    });

    // Handle errors
    connection.on("error", (error: ConnectionError) => {
      if (error.type === "protocol") {
        metrics.protocolError();
      }
      logger.error(`[${id}] ${error.code}: ${error.reason}`, {
        type: error.type,
        fatal: error.fatal,
        messageType: error.messageType,
        frameLength: error.frameLength,
      });
    });

    // Handle close
    connection.on(
      "close",
      (stats: { reason?: ProtocolError; bytesSent: number; bytesReceived: number }) => {
        metrics.connectionClosed();
        metrics.bytesSent(stats.bytesSent);
        metrics.bytesReceived(stats.bytesReceived);

        logger.connection(id, "Closed", {
          reason: stats.reason?.code,
          sent: `${stats.bytesSent}B`,
          received: `${stats.bytesReceived}B`,
        });

        this.context.users.delete(id);
      }
    );

    // Idle connections are closed by the session's liveness check
    connection.startKeepAlive(this.config.heartbeatInterval);

    return connection;
  }

  /**
   * Route a message to its handler
   */
  private handleMessage(connection: Connection, message: Message): void {
    try {
      switch (message.type) {
        case MessageType.LOGIN_REQUEST:
          handleLogin(connection, message, this.context);
          break;

        case MessageType.SUBMIT_ORDER:
          handleSubmitOrder(connection, message, this.context);
          break;

        case MessageType.HEARTBEAT:
          handleHeartbeat(connection);
          break;

        default:
          // The session closes the connection before clients can get here
          logger.warn(
            `[${connection.connectionId}] Unhandled message type: ${MessageType[message.type]}`
          );
      }
    } catch (err) {
      logger.error(`[${connection.connectionId}] Handler error`, {
        error: err instanceof Error ? err.message : String(err),
      });
      connection.close();
    }
  }

  /**
   * Authenticated user of a connection, if any
   */
  getUserId(connectionId: string): string | undefined {
    return this.context.users.get(connectionId);
  }

  /**
   * Get server stats
   */
  getStats() {
    return {
      connections: this.connectionManager.getConnectionCount(),
      authenticated: this.connectionManager.getAuthenticatedCount(),
    };
  }
}

import { connect } from "net";
import { EventEmitter } from "events";
import {
  Connection,
  type ByteStream,
  type ConnectionError,
} from "../../../packages/transport/src/connection/connection.js";
import {
  SessionState,
  type Clock,
} from "../../../packages/transport/src/session/session.js";
import { MessageType } from "../../../packages/protocol/src/constants.js";
import type {
  LoginResponse,
  Message,
  OrderResponse,
  SubmitOrder,
} from "../../../packages/protocol/src/types.js";
import {
  ProtocolError,
  SessionClosedError,
  TransportError,
} from "../../../packages/protocol/src/errors.js";

export interface ClientOptions {
  heartbeatIntervalMs?: number;
  heartbeatTimeoutMs?: number;
  maxFrameSize?: number;
  clock?: Clock;
}

/**
 * Order fields supplied by the caller; the timestamp defaults to now
 */
export type OrderRequest = Omit<SubmitOrder, "type" | "timestampMs"> & {
  timestampMs?: number;
};

type PendingOrder = {
  orderId: string;
  resolve: (response: OrderResponse) => void;
  reject: (err: Error) => void;
};

type PendingLogin = {
  resolve: (response: LoginResponse) => void;
  reject: (err: Error) => void;
};

/**
 * ExchangeClient - TCP client for the order gateway
 *
 * The protocol has no correlation ids: the next LOGIN_RESPONSE answers the
 * login and each ORDER_RESPONSE answers the oldest unanswered order.
 */
export class ExchangeClient extends EventEmitter {
  private connection: Connection | null = null;
  private pendingLogin: PendingLogin | null = null;
  private pendingOrders: PendingOrder[] = [];
  private connected: boolean = false;
  private nextId: number = 1;
  private readonly options: ClientOptions;

  constructor(options: ClientOptions = {}) {
    super();
    this.options = options;
  }

  /**
   * Connect to the gateway
   */
  connect(host: string, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = connect(port, host);

      socket.once("connect", () => {
        this.attach(socket);
        resolve();
      });

      socket.once("error", (err) => {
        if (!this.connected) {
          reject(err);
        }
      });
    });
  }

  /**
   * Speak the protocol over an already open byte stream
   */
  attach(stream: ByteStream): Connection {
    const connection = new Connection(stream, `client-${this.nextId++}`, {
      role: "client",
      maxFrameSize: this.options.maxFrameSize,
      heartbeatTimeoutMs: this.options.heartbeatTimeoutMs,
      clock: this.options.clock,
    });

    this.connection = connection;
    this.connected = true;
    this.wireConnection(connection);
    this.emit("connected");

    return connection;
  }

  /**
   * Wire connection events
   */
  private wireConnection(connection: Connection): void {
    connection.on("message", (message: Message) => {
      this.handleMessage(connection, message);
    });

    connection.on("error", (error: ConnectionError) => {
      if (error.fatal) {
        this.failPending(
          connection.session.getCloseReason() ?? new TransportError(error.reason)
        );
      }
      if (this.listenerCount("error") > 0) {
        this.emit("error", error);
      }
    });

    connection.on("close", (stats: { reason?: ProtocolError }) => {
      this.connected = false;
      this.failPending(stats.reason ?? new SessionClosedError());
      this.emit("disconnected", stats.reason);
    });
  }

  /**
   * Handle a decoded message
   */
  private handleMessage(connection: Connection, message: Message): void {
    switch (message.type) {
      case MessageType.LOGIN_RESPONSE: {
        const pending = this.pendingLogin;
        this.pendingLogin = null;
        if (this.options.heartbeatIntervalMs) {
          connection.startKeepAlive(this.options.heartbeatIntervalMs);
        }
        pending?.resolve(message);
        this.emit("login", message);
        break;
      }

      case MessageType.ORDER_RESPONSE: {
        const pending = this.pendingOrders.shift();
        if (!pending) {
          this.emit("unsolicited", message);
          break;
        }
        if (pending.orderId !== message.orderId) {
          this.emit("mismatch", pending.orderId, message);
        }
        pending.resolve(message);
        break;
      }

      case MessageType.HEARTBEAT_ACK:
        this.emit("heartbeat", message);
        break;

      default:
        this.emit("message", message);
    }
  }

  /**
   * Log in. Resolves with a successful LOGIN_RESPONSE; a rejected login
   * rejects with LoginRejectedError and the connection closes.
   */
  login(token: string): Promise<LoginResponse> {
    return new Promise((resolve, reject) => {
      const previous = this.pendingLogin;
      const pending: PendingLogin = { resolve, reject };
      this.pendingLogin = pending;

      try {
        this.requireConnection().send({
          type: MessageType.LOGIN_REQUEST,
          token,
        });
      } catch (err) {
        if (this.pendingLogin === pending) {
          this.pendingLogin = previous;
        }
        reject(err);
      }
    });
  }

  /**
   * Submit an order and wait for its ORDER_RESPONSE
   */
  submitOrder(order: OrderRequest): Promise<OrderResponse> {
    return new Promise((resolve, reject) => {
      // Queued before the write so a synchronous transport cannot outrun it
      const pending: PendingOrder = { orderId: order.orderId, resolve, reject };
      this.pendingOrders.push(pending);

      try {
        this.requireConnection().send({
          type: MessageType.SUBMIT_ORDER,
          ...order,
          timestampMs: order.timestampMs ?? Date.now(),
        });
      } catch (err) {
        this.pendingOrders = this.pendingOrders.filter((p) => p !== pending);
        reject(err);
      }
    });
  }

  /**
   * Send heartbeat
   */
  heartbeat(): void {
    this.requireConnection().send({ type: MessageType.HEARTBEAT });
  }

  /**
   * Disconnect
   */
  disconnect(): void {
    if (this.connection) {
      this.connection.close();
    }
  }

  /**
   * Check if connected
   */
  isConnected(): boolean {
    return this.connected;
  }

  getSessionState(): SessionState {
    return this.connection ? this.connection.session.getState() : SessionState.CLOSED;
  }

  getPendingOrderCount(): number {
    return this.pendingOrders.length;
  }

  private requireConnection(): Connection {
    if (!this.connected || !this.connection) {
      throw new SessionClosedError();
    }
    return this.connection;
  }

  private failPending(reason: Error): void {
    const login = this.pendingLogin;
    const orders = this.pendingOrders;
    this.pendingLogin = null;
    this.pendingOrders = [];

    login?.reject(reason);
    for (const pending of orders) {
      pending.reject(reason);
    }
  }
}

import { EventEmitter } from "events";
import { ByteCursor } from "../../../protocol/src/cursor.js";
import { tryExtractFrame } from "../../../protocol/src/frame.js";
import { decodeMessage, encodeMessage } from "../../../protocol/src/codec.js";
import { defaultRegistry, type MessageRegistry } from "../../../protocol/src/schema.js";
import { MessageType, MAX_FRAME_SIZE } from "../../../protocol/src/constants.js";
import type { Frame, Message } from "../../../protocol/src/types.js";
import {
  InvalidFieldError,
  ProtocolError,
  SessionClosedError,
  TransportError,
  type ProtocolErrorCode,
} from "../../../protocol/src/errors.js";
import {
  Session,
  SessionState,
  type Clock,
  type SessionAction,
  type SessionRole,
} from "../session/session.js";

export enum ConnectionState {
  INIT = "INIT",
  OPEN = "OPEN",
  DRAINING = "DRAINING",
  CLOSING = "CLOSING",
  CLOSED = "CLOSED",
}

/**
 * The slice of a socket a Connection needs. net.Socket satisfies it.
 */
export interface ByteStream {
  write(data: Buffer): boolean;
  end(): void;
  destroy(): void;
  on(event: "data", listener: (chunk: Buffer) => void): unknown;
  on(event: "drain" | "close", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export type ConnectionError = {
  type: "transport" | "protocol" | "session";
  code: ProtocolErrorCode;
  reason: string;
  fatal: boolean;
  messageType?: number;
  frameLength?: number;
};

export interface ConnectionOptions {
  role: SessionRole;
  maxFrameSize?: number;
  registry?: MessageRegistry;
  clock?: Clock;
  heartbeatTimeoutMs?: number;
  idleTimeoutMs?: number;
  lingerMs?: number; // how long a closing stream may take to finish before it is destroyed
}

const DEFAULT_LINGER_MS = 2000;

/**
 * Connection represents one peer's byte-stream lifecycle.
 *
 * Responsibilities:
 * - Receive buffering and incremental frame extraction
 * - Decoding through the message registry
 * - Passing every message through the Session gate
 * - Backpressure handling for outbound writes
 * - State machine enforcement (INIT → OPEN ⟷ DRAINING → CLOSING → CLOSED)
 * - Keep-alive timers
 *
 * Does NOT:
 * - Interpret order or login semantics
 * - Open sockets or reconnect
 * - Manage other connections
 */
export class Connection extends EventEmitter {
  private stream: ByteStream;
  private state: ConnectionState = ConnectionState.INIT;
  public readonly connectionId: string;
  public readonly session: Session;

  private readonly maxFrameSize: number;
  private readonly registry: MessageRegistry;
  private readonly clock: Clock | undefined;
  private readonly lingerMs: number;

  // Buffering / parsing state
  private recvBuffer: ByteCursor = new ByteCursor();

  // Keep-alive
  private keepAliveTimer: NodeJS.Timeout | null = null;
  private lingerTimer: NodeJS.Timeout | null = null;

  // Statistics
  private bytesSent: number = 0;
  private bytesReceived: number = 0;
  private framesSent: number = 0;
  private framesReceived: number = 0;
  private lastHeartbeatAt: number | null = null;

  constructor(stream: ByteStream, connectionId: string, options: ConnectionOptions) {
    super();
    this.stream = stream;
    this.connectionId = connectionId;
    this.maxFrameSize = options.maxFrameSize ?? MAX_FRAME_SIZE;
    this.registry = options.registry ?? defaultRegistry;
    this.clock = options.clock;
    this.lingerMs = options.lingerMs ?? DEFAULT_LINGER_MS;
    this.session = new Session({
      role: options.role,
      clock: options.clock,
      heartbeatTimeoutMs: options.heartbeatTimeoutMs,
      idleTimeoutMs: options.idleTimeoutMs,
    });
    this.session.on("state", (next: SessionState, previous: SessionState) => {
      this.emit("session", next, previous);
    });
    this.wireStream();
    this.transition(ConnectionState.OPEN);
    this.emit("open", connectionId);
  }

  /**
   * Bind stream events to Connection behavior
   */
  private wireStream(): void {
    // Data event
    this.stream.on("data", (chunk: Buffer) => {
      if (
        this.state === ConnectionState.CLOSING ||
        this.state === ConnectionState.CLOSED
      ) {
        return;
      }
      this.bytesReceived += chunk.length;
      this.onData(chunk);
    });

    // Drain event
    this.stream.on("drain", () => {
      if (this.state === ConnectionState.DRAINING) {
        this.transition(ConnectionState.OPEN);
        this.emit("drain", 0);
      }
    });

    // Close event
    this.stream.on("close", () => {
      this.handleClose();
    });

    // Error event
    this.stream.on("error", (err: Error) => {
      this.abort("transport", new TransportError(err.message));
    });
  }

  /**
   * Handle incoming data chunk
   */
  private onData(chunk: Buffer): void {
    this.recvBuffer.append(chunk);
    this.parse();
  }

  /**
   * Incremental frame parser
   *
   * Extracts every complete frame from the receive buffer, in order.
   * Handles fragmentation and frame coalescing. Any framing, decoding or
   * legality failure closes the connection: after a bad frame the byte
   * alignment can no longer be trusted.
   */
  private parse(): void {
    while (this.state === ConnectionState.OPEN || this.state === ConnectionState.DRAINING) {
      let frame: Frame | null;
      let message: Message;

      try {
        frame = tryExtractFrame(this.recvBuffer, this.maxFrameSize);
        if (!frame) {
          return;
        }
        message = decodeMessage(frame, this.registry);
      } catch (err) {
        this.abort("protocol", toProtocolError(err));
        return;
      }

      this.framesReceived++;

      const action = this.session.onReceive(message);
      if (action.kind === "close") {
        this.handleAction(action);
        return;
      }

      if (
        message.type === MessageType.HEARTBEAT ||
        message.type === MessageType.HEARTBEAT_ACK
      ) {
        this.lastHeartbeatAt = this.now();
        this.emit("heartbeat", message, this.lastHeartbeatAt);
      }

      // Emit decoded message for higher layers
      this.emit("message", message);
    }
  }

  /**
   * Send a message to the peer
   *
   * The session gate runs before anything is written. Gate errors
   * (SessionNotAuthenticatedError, SessionClosedError, ...) and field
   * validation errors are thrown to the caller; nothing reaches the wire.
   */
  send(message: Message): void {
    if (
      this.state !== ConnectionState.OPEN &&
      this.state !== ConnectionState.DRAINING
    ) {
      throw new SessionClosedError(message.type);
    }

    const buffer = encodeMessage(message, this.registry);
    if (buffer.length > this.maxFrameSize) {
      throw new InvalidFieldError(
        "frame",
        `encoded size ${buffer.length} exceeds ${this.maxFrameSize}`,
        false,
        { messageType: message.type }
      );
    }

    const action = this.session.onSend(message);

    this.bytesSent += buffer.length;
    this.framesSent++;

    const canWrite = this.stream.write(buffer);

    if (!canWrite && this.state === ConnectionState.OPEN) {
      this.transition(ConnectionState.DRAINING);
    }

    // A rejected login is written first, then the connection winds down
    this.handleAction(action);
  }

  /**
   * Start the keep-alive loop
   *
   * Client: sends a Heartbeat every interval once authenticated, unless one
   * is still waiting for its ack, and checks liveness on every tick.
   * Server: only checks liveness.
   */
  startKeepAlive(intervalMs: number): void {
    this.stopKeepAlive();

    this.keepAliveTimer = setInterval(() => this.tick(), intervalMs);
    this.keepAliveTimer.unref();
  }

  stopKeepAlive(): void {
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
  }

  /**
   * One keep-alive step. Exposed for deterministic tests.
   */
  tick(): void {
    if (this.state === ConnectionState.CLOSING || this.state === ConnectionState.CLOSED) {
      return;
    }

    const action = this.session.checkLiveness();
    if (action.kind === "close") {
      this.handleAction(action);
      return;
    }

    if (
      this.session.role === "client" &&
      this.session.isAuthenticated() &&
      !this.session.awaitingHeartbeatAck()
    ) {
      this.send({ type: MessageType.HEARTBEAT });
    }
  }

  /**
   * Close the connection gracefully
   *
   * Ends the stream so queued writes are flushed. A peer that never
   * finishes its side is destroyed once lingerMs passes.
   */
  close(): void {
    if (
      this.state === ConnectionState.CLOSING ||
      this.state === ConnectionState.CLOSED
    ) {
      return;
    }

    this.stopKeepAlive();
    this.transition(ConnectionState.CLOSING);

    this.lingerTimer = setTimeout(() => this.stream.destroy(), this.lingerMs);
    this.lingerTimer.unref();

    this.stream.end();
  }

  /**
   * Fail the session and tear the stream down without lingering: after a
   * corrupt frame nothing more is read or written.
   */
  private abort(type: ConnectionError["type"], error: ProtocolError): void {
    this.session.fail(error);
    this.close();
    if (this.state !== ConnectionState.CLOSED) {
      this.stream.destroy();
    }

    this.report({
      type,
      code: error.code,
      reason: error.message,
      fatal: true,
      ...error.context,
    });
  }

  private handleAction(action: SessionAction): void {
    if (action.kind === "continue") return;

    const { error } = action;
    this.close();

    this.report({
      type: "session",
      code: error.code,
      reason: error.message,
      fatal: error.fatal,
      ...error.context,
    });
  }

  /**
   * Emit an error event, if anyone listens. The connection is already
   * closing by the time this runs.
   */
  private report(error: ConnectionError): void {
    if (this.listenerCount("error") > 0) {
      this.emit("error", error);
    }
  }

  /**
   * Handle stream close event
   */
  private handleClose(): void {
    if (this.state === ConnectionState.CLOSED) return;

    this.stopKeepAlive();
    if (this.lingerTimer) {
      clearTimeout(this.lingerTimer);
      this.lingerTimer = null;
    }
    this.session.fail(new TransportError("Connection closed"));
    this.transition(ConnectionState.CLOSED);
    this.emit("close", {
      reason: this.session.getCloseReason(),
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
    });
  }

  /**
   * Transition to a new state
   */
  private transition(next: ConnectionState): void {
    if (this.state === next) return;

    // Enforce state machine rules
    const allowed = this.isTransitionAllowed(this.state, next);
    if (!allowed) {
      throw new Error(`Invalid state transition: ${this.state} → ${next}`);
    }

    this.state = next;
    this.emit("state", next);
  }

  /**
   * Check if a state transition is valid
   */
  private isTransitionAllowed(
    from: ConnectionState,
    to: ConnectionState
  ): boolean {
    const transitions: Record<ConnectionState, ConnectionState[]> = {
      [ConnectionState.INIT]: [ConnectionState.OPEN],
      [ConnectionState.OPEN]: [
        ConnectionState.DRAINING,
        ConnectionState.CLOSING,
        ConnectionState.CLOSED,
      ],
      [ConnectionState.DRAINING]: [
        ConnectionState.OPEN,
        ConnectionState.CLOSING,
        ConnectionState.CLOSED,
      ],
      [ConnectionState.CLOSING]: [ConnectionState.CLOSED],
      [ConnectionState.CLOSED]: [],
    };

    return transitions[from].includes(to);
  }

  private now(): number {
    return this.clock ? this.clock.now() : Date.now();
  }

  /**
   * Get current connection state
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Get connection statistics
   */
  getStats() {
    return {
      connectionId: this.connectionId,
      state: this.state,
      session: this.session.getState(),
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      framesSent: this.framesSent,
      framesReceived: this.framesReceived,
      lastHeartbeatAt: this.lastHeartbeatAt,
      bufferSize: this.recvBuffer.available,
    };
  }
}

function toProtocolError(err: unknown): ProtocolError {
  if (err instanceof ProtocolError) return err;
  return new ProtocolError(
    "TRANSPORT_ERROR",
    err instanceof Error ? err.message : String(err),
    true
  );
}

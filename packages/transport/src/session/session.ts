import { EventEmitter } from "events";
import { MessageType } from "../../../protocol/src/constants.js";
import type { Message } from "../../../protocol/src/types.js";
import {
  HeartbeatTimeoutError,
  LoginRejectedError,
  ProtocolError,
  SessionClosedError,
  SessionNotAuthenticatedError,
  UnexpectedMessageError,
} from "../../../protocol/src/errors.js";

export enum SessionState {
  UNAUTHENTICATED = "UNAUTHENTICATED",
  AUTHENTICATING = "AUTHENTICATING",
  AUTHENTICATED = "AUTHENTICATED",
  CLOSED = "CLOSED",
}

/**
 * Which end of the connection this session represents.
 * The client logs in and sends orders; the server answers.
 */
export type SessionRole = "client" | "server";

/**
 * Monotonic time source in milliseconds
 */
export interface Clock {
  now(): number;
}

export const monotonicClock: Clock = {
  now: () => performance.now(),
};

/**
 * What the connection owner has to do after a session call
 */
export type SessionAction =
  | { kind: "continue" }
  | { kind: "close"; error: ProtocolError };

export interface SessionOptions {
  role: SessionRole;
  clock?: Clock;
  heartbeatTimeoutMs?: number; // client: max wait for an ack after a heartbeat
  idleTimeoutMs?: number; // server: max silence from the peer
}

const CONTINUE: SessionAction = { kind: "continue" };

// Messages each role puts on the wire; everything else is inbound-only
const OUTBOUND: Record<SessionRole, ReadonlySet<MessageType>> = {
  client: new Set([
    MessageType.LOGIN_REQUEST,
    MessageType.SUBMIT_ORDER,
    MessageType.HEARTBEAT,
  ]),
  server: new Set([
    MessageType.LOGIN_RESPONSE,
    MessageType.ORDER_RESPONSE,
    MessageType.HEARTBEAT_ACK,
  ]),
};

/**
 * Session tracks one connection's authentication and liveness.
 *
 * Every inbound and outbound message passes through here, so legality is
 * decided in one place:
 * UNAUTHENTICATED → AUTHENTICATING → AUTHENTICATED, and CLOSED from anywhere.
 *
 * Does NOT:
 * - Read from or write to the transport
 * - Start timers (the owner calls checkLiveness)
 */
export class Session extends EventEmitter {
  readonly role: SessionRole;
  private state: SessionState = SessionState.UNAUTHENTICATED;
  private readonly clock: Clock;
  private readonly heartbeatTimeoutMs: number;
  private readonly idleTimeoutMs: number;

  private token: string | undefined;
  private lastHeartbeatSent: number | undefined;
  private lastHeartbeatAck: number | undefined;
  private lastActivity: number;
  private closeReason: ProtocolError | undefined;

  constructor(options: SessionOptions) {
    super();
    this.role = options.role;
    this.clock = options.clock ?? monotonicClock;
    this.heartbeatTimeoutMs = options.heartbeatTimeoutMs ?? 15000;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 30000;
    this.lastActivity = this.clock.now();
  }

  /**
   * Gate an outbound message and apply its transition.
   *
   * Called after the message has been encoded and before it is written.
   * Throws without changing state when the message may not be sent.
   */
  onSend(message: Message): SessionAction {
    const type = message.type;

    if (this.state === SessionState.CLOSED) {
      throw new SessionClosedError(type);
    }

    if (!OUTBOUND[this.role].has(type)) {
      throw new UnexpectedMessageError(type, this.state, false);
    }

    switch (message.type) {
      case MessageType.LOGIN_REQUEST:
        if (this.state !== SessionState.UNAUTHENTICATED) {
          throw new UnexpectedMessageError(type, this.state, false);
        }
        this.token = message.token;
        this.transition(SessionState.AUTHENTICATING);
        return CONTINUE;

      case MessageType.LOGIN_RESPONSE:
        if (this.state !== SessionState.AUTHENTICATING) {
          throw new UnexpectedMessageError(type, this.state, false);
        }
        if (message.success) {
          this.transition(SessionState.AUTHENTICATED);
          return CONTINUE;
        }
        return this.closeWith(new LoginRejectedError(message.message));

      case MessageType.HEARTBEAT:
        this.requireAuthenticated(type);
        this.lastHeartbeatSent = this.clock.now();
        return CONTINUE;

      default:
        this.requireAuthenticated(type);
        return CONTINUE;
    }
  }

  /**
   * Validate an inbound message and apply its transition.
   *
   * A message that is illegal here means the peer is out of sync;
   * the session closes and the action says so.
   */
  onReceive(message: Message): SessionAction {
    const type = message.type;

    if (this.state === SessionState.CLOSED) {
      throw new SessionClosedError(type);
    }

    this.lastActivity = this.clock.now();

    if (OUTBOUND[this.role].has(type)) {
      return this.closeWith(new UnexpectedMessageError(type, this.state, true));
    }

    switch (message.type) {
      case MessageType.LOGIN_REQUEST:
        if (this.state !== SessionState.UNAUTHENTICATED) {
          return this.closeWith(
            new UnexpectedMessageError(type, this.state, true)
          );
        }
        this.token = message.token;
        this.transition(SessionState.AUTHENTICATING);
        return CONTINUE;

      case MessageType.LOGIN_RESPONSE:
        if (this.state !== SessionState.AUTHENTICATING) {
          return this.closeWith(
            new UnexpectedMessageError(type, this.state, true)
          );
        }
        if (message.success) {
          this.transition(SessionState.AUTHENTICATED);
          return CONTINUE;
        }
        return this.closeWith(new LoginRejectedError(message.message));

      default:
        if (this.state !== SessionState.AUTHENTICATED) {
          return this.closeWith(
            new UnexpectedMessageError(type, this.state, true)
          );
        }
        if (type === MessageType.HEARTBEAT_ACK) {
          this.lastHeartbeatAck = this.clock.now();
        }
        return CONTINUE;
    }
  }

  /**
   * Check heartbeat liveness against the clock.
   *
   * Client: a heartbeat is outstanding for heartbeatTimeoutMs or longer.
   * Server: nothing arrived from the peer for idleTimeoutMs or longer.
   * Reports a close action at most once.
   */
  checkLiveness(): SessionAction {
    if (this.state === SessionState.CLOSED) return CONTINUE;

    const now = this.clock.now();

    if (this.role === "client") {
      if (this.lastHeartbeatSent === undefined) return CONTINUE;

      const acked =
        this.lastHeartbeatAck !== undefined &&
        this.lastHeartbeatAck >= this.lastHeartbeatSent;
      const elapsed = now - this.lastHeartbeatSent;

      if (!acked && elapsed >= this.heartbeatTimeoutMs) {
        return this.closeWith(
          new HeartbeatTimeoutError(elapsed, this.heartbeatTimeoutMs)
        );
      }
      return CONTINUE;
    }

    const idle = now - this.lastActivity;
    if (idle >= this.idleTimeoutMs) {
      return this.closeWith(new HeartbeatTimeoutError(idle, this.idleTimeoutMs));
    }
    return CONTINUE;
  }

  /**
   * Tear down after a transport error or decode failure.
   * Only the first call reports a close action.
   */
  fail(error: ProtocolError): SessionAction {
    if (this.state === SessionState.CLOSED) return CONTINUE;
    return this.closeWith(error);
  }

  /**
   * Whether a heartbeat is waiting for its ack
   */
  awaitingHeartbeatAck(): boolean {
    if (this.lastHeartbeatSent === undefined) return false;
    return (
      this.lastHeartbeatAck === undefined ||
      this.lastHeartbeatAck < this.lastHeartbeatSent
    );
  }

  getState(): SessionState {
    return this.state;
  }

  isAuthenticated(): boolean {
    return this.state === SessionState.AUTHENTICATED;
  }

  getToken(): string | undefined {
    return this.token;
  }

  getCloseReason(): ProtocolError | undefined {
    return this.closeReason;
  }

  getStats() {
    return {
      role: this.role,
      state: this.state,
      lastHeartbeatSent: this.lastHeartbeatSent,
      lastHeartbeatAck: this.lastHeartbeatAck,
      lastActivity: this.lastActivity,
    };
  }

  private requireAuthenticated(type: MessageType): void {
    if (this.state !== SessionState.AUTHENTICATED) {
      throw new SessionNotAuthenticatedError(type);
    }
  }

  private closeWith(error: ProtocolError): SessionAction {
    this.closeReason = error;
    this.transition(SessionState.CLOSED);
    return { kind: "close", error };
  }

  /**
   * Transition to a new state
   */
  private transition(next: SessionState): void {
    if (this.state === next) return;

    if (!this.isTransitionAllowed(this.state, next)) {
      throw new Error(`Invalid session transition: ${this.state} → ${next}`);
    }

    const previous = this.state;
    this.state = next;
    this.emit("state", next, previous);
  }

  private isTransitionAllowed(from: SessionState, to: SessionState): boolean {
    const transitions: Record<SessionState, SessionState[]> = {
      [SessionState.UNAUTHENTICATED]: [
        SessionState.AUTHENTICATING,
        SessionState.CLOSED,
      ],
      [SessionState.AUTHENTICATING]: [
        SessionState.AUTHENTICATED,
        SessionState.CLOSED,
      ],
      [SessionState.AUTHENTICATED]: [SessionState.CLOSED],
      [SessionState.CLOSED]: [],
    };

    return transitions[from].includes(to);
  }
}

/**
 * Protocol Error Classes
 *
 * `fatal` errors mean the byte stream can no longer be trusted and the
 * connection must be closed. Non-fatal errors are rejected locally.
 */

import { MessageType } from "./constants.js";

export type ProtocolErrorCode =
  | "INSUFFICIENT_DATA"
  | "FRAME_TOO_LARGE"
  | "FRAME_TOO_SMALL"
  | "UNKNOWN_MESSAGE_TYPE"
  | "TRUNCATED_MESSAGE"
  | "TRAILING_BYTES"
  | "INVALID_FIELD"
  | "SESSION_NOT_AUTHENTICATED"
  | "SESSION_CLOSED"
  | "UNEXPECTED_MESSAGE"
  | "HEARTBEAT_TIMEOUT"
  | "LOGIN_REJECTED"
  | "TRANSPORT_ERROR";

export type ErrorContext = {
  messageType?: number;
  frameLength?: number;
};

export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;
  readonly fatal: boolean;
  readonly context: ErrorContext;

  constructor(
    code: ProtocolErrorCode,
    message: string,
    fatal: boolean,
    context: ErrorContext = {}
  ) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
    this.fatal = fatal;
    this.context = context;
  }
}

export class InsufficientDataError extends ProtocolError {
  constructor(requested: number, available: number) {
    super(
      "INSUFFICIENT_DATA",
      `Insufficient data: requested ${requested} bytes, ${available} buffered`,
      false
    );
    this.name = "InsufficientDataError";
  }
}

export class FrameTooLargeError extends ProtocolError {
  constructor(frameLength: number, maxFrameSize: number) {
    super(
      "FRAME_TOO_LARGE",
      `Frame too large: ${frameLength} > ${maxFrameSize}`,
      true,
      { frameLength }
    );
    this.name = "FrameTooLargeError";
  }
}

export class FrameTooSmallError extends ProtocolError {
  constructor(frameLength: number) {
    super(
      "FRAME_TOO_SMALL",
      `Frame too small: declared length ${frameLength} is shorter than its own length field`,
      true,
      { frameLength }
    );
    this.name = "FrameTooSmallError";
  }
}

export class UnknownMessageTypeError extends ProtocolError {
  constructor(messageType: number, frameLength?: number) {
    super(
      "UNKNOWN_MESSAGE_TYPE",
      `Unknown message type: 0x${messageType.toString(16).padStart(2, "0")}`,
      true,
      { messageType, frameLength }
    );
    this.name = "UnknownMessageTypeError";
  }
}

export class TruncatedMessageError extends ProtocolError {
  constructor(message: string, context: ErrorContext = {}) {
    super("TRUNCATED_MESSAGE", message, true, context);
    this.name = "TruncatedMessageError";
  }
}

export class TrailingBytesError extends ProtocolError {
  constructor(extra: number, context: ErrorContext = {}) {
    super(
      "TRAILING_BYTES",
      `Frame has ${extra} trailing byte(s) after the last field`,
      true,
      context
    );
    this.name = "TrailingBytesError";
  }
}

export class InvalidFieldError extends ProtocolError {
  readonly field: string;

  constructor(
    field: string,
    reason: string,
    fatal: boolean,
    context: ErrorContext = {}
  ) {
    super("INVALID_FIELD", `Invalid ${field}: ${reason}`, fatal, context);
    this.name = "InvalidFieldError";
    this.field = field;
  }
}

export class SessionNotAuthenticatedError extends ProtocolError {
  constructor(messageType: MessageType) {
    super(
      "SESSION_NOT_AUTHENTICATED",
      `Cannot exchange ${MessageType[messageType]} before authentication`,
      false,
      { messageType }
    );
    this.name = "SessionNotAuthenticatedError";
  }
}

export class SessionClosedError extends ProtocolError {
  constructor(messageType?: MessageType) {
    super(
      "SESSION_CLOSED",
      messageType === undefined
        ? "Session is closed"
        : `Cannot exchange ${MessageType[messageType]}: session is closed`,
      false,
      { messageType }
    );
    this.name = "SessionClosedError";
  }
}

export class UnexpectedMessageError extends ProtocolError {
  constructor(messageType: MessageType, state: string, fatal: boolean) {
    super(
      "UNEXPECTED_MESSAGE",
      `Unexpected ${MessageType[messageType]} in state ${state}`,
      fatal,
      { messageType }
    );
    this.name = "UnexpectedMessageError";
  }
}

export class HeartbeatTimeoutError extends ProtocolError {
  readonly elapsedMs: number;

  constructor(elapsedMs: number, timeoutMs: number) {
    super(
      "HEARTBEAT_TIMEOUT",
      `No heartbeat activity for ${Math.round(elapsedMs)}ms (timeout ${timeoutMs}ms)`,
      true
    );
    this.name = "HeartbeatTimeoutError";
    this.elapsedMs = elapsedMs;
  }
}

export class LoginRejectedError extends ProtocolError {
  constructor(reason: string) {
    super("LOGIN_REJECTED", `Login rejected: ${reason}`, true, {
      messageType: MessageType.LOGIN_RESPONSE,
    });
    this.name = "LoginRejectedError";
  }
}

export class TransportError extends ProtocolError {
  constructor(reason: string) {
    super("TRANSPORT_ERROR", reason, true);
    this.name = "TransportError";
  }
}

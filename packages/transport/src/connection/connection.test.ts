import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  Connection,
  ConnectionState,
  type ConnectionError,
  type ConnectionOptions,
} from "./connection.js";
import { SessionState } from "../session/session.js";
import { MemoryStream, ManualClock } from "../testing/fakes.js";
import { encodeMessage } from "../../../protocol/src/codec.js";
import { MessageType, OrderSide, OrderType } from "../../../protocol/src/constants.js";
import type { Message, SubmitOrder } from "../../../protocol/src/types.js";
import {
  FrameTooLargeError,
  HeartbeatTimeoutError,
  InvalidFieldError,
  SessionClosedError,
  SessionNotAuthenticatedError,
  TransportError,
} from "../../../protocol/src/errors.js";

const order: SubmitOrder = {
  type: MessageType.SUBMIT_ORDER,
  orderId: "ORD-1",
  userId: "trader-7",
  symbol: "AAPL",
  side: OrderSide.BUY,
  orderType: OrderType.LIMIT,
  quantity: 100,
  price: 150.25,
  timestampMs: 1700000000000,
};

const loginRequest: Message = { type: MessageType.LOGIN_REQUEST, token: "test-secret" };
const loginOk: Message = {
  type: MessageType.LOGIN_RESPONSE,
  success: true,
  message: "Authentication successful",
};

type Harness = {
  stream: MemoryStream;
  connection: Connection;
  messages: Message[];
  errors: ConnectionError[];
  closes: Array<{ reason?: Error }>;
};

function open(
  options: ConnectionOptions,
  clock: ManualClock,
  stream: MemoryStream = new MemoryStream()
): Harness {
  const connection = new Connection(stream, "conn-1", { clock, ...options });
  const harness: Harness = { stream, connection, messages: [], errors: [], closes: [] };

  connection.on("message", (message: Message) => harness.messages.push(message));
  connection.on("error", (error: ConnectionError) => harness.errors.push(error));
  connection.on("close", (stats: { reason?: Error }) => harness.closes.push(stats));

  return harness;
}

describe("Connection", () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
  });

  describe("server role", () => {
    let h: Harness;

    beforeEach(() => {
      h = open({ role: "server" }, clock);
    });

    /** Log the peer in and discard what was written */
    function authenticate(): void {
      h.stream.push(encodeMessage(loginRequest));
      h.connection.send(loginOk);
      h.stream.takeWritten();
    }

    it("starts open and unauthenticated", () => {
      expect(h.connection.getState()).toBe(ConnectionState.OPEN);
      expect(h.connection.session.getState()).toBe(SessionState.UNAUTHENTICATED);
    });

    it("reassembles a frame delivered one byte at a time", () => {
      const bytes = encodeMessage(loginRequest);
      for (let i = 0; i < bytes.length; i++) {
        h.stream.push(bytes.subarray(i, i + 1));
      }

      expect(h.messages).toEqual([loginRequest]);
      expect(h.connection.session.getState()).toBe(SessionState.AUTHENTICATING);
      expect(h.connection.getStats()).toMatchObject({
        bytesReceived: bytes.length,
        framesReceived: 1,
        bufferSize: 0,
      });
    });

    it("emits coalesced frames in order", () => {
      authenticate();
      const second = { ...order, orderId: "ORD-2" };
      h.stream.push(Buffer.concat([encodeMessage(order), encodeMessage(second)]));

      expect(h.messages).toEqual([loginRequest, order, second]);
    });

    it("keeps a partial trailing frame buffered", () => {
      authenticate();
      const bytes = encodeMessage(order);
      h.stream.push(Buffer.concat([encodeMessage(order), bytes.subarray(0, 10)]));

      expect(h.messages).toHaveLength(2);
      expect(h.connection.getStats().bufferSize).toBe(10);

      h.stream.push(bytes.subarray(10));
      expect(h.messages).toHaveLength(3);
    });

    it("writes the encoded frame", () => {
      h.stream.push(encodeMessage(loginRequest));
      h.connection.send(loginOk);

      expect(h.stream.takeWritten()).toEqual(encodeMessage(loginOk));
      expect(h.connection.session.isAuthenticated()).toBe(true);
      expect(h.connection.getStats().framesSent).toBe(1);
    });

    it("closes on an oversized frame without waiting for its body", () => {
      const header = Buffer.alloc(4);
      header.writeUInt32BE(8193, 0);
      h.stream.push(header);

      expect(h.errors).toEqual([
        {
          type: "protocol",
          code: "FRAME_TOO_LARGE",
          reason: "Frame too large: 8193 > 8192",
          fatal: true,
          frameLength: 8193,
        },
      ]);
      expect(h.stream.ended).toBe(true);
      expect(h.connection.getState()).toBe(ConnectionState.CLOSED);
      expect(h.closes).toHaveLength(1);
      expect(h.closes[0]?.reason).toBeInstanceOf(FrameTooLargeError);
    });

    it("closes on an undecodable frame", () => {
      h.stream.push(Buffer.from([0, 0, 0, 5, 0x42]));

      expect(h.errors[0]).toMatchObject({
        type: "protocol",
        code: "UNKNOWN_MESSAGE_TYPE",
        messageType: 0x42,
      });
      expect(h.stream.ended).toBe(true);
      expect(h.messages).toEqual([]);
    });

    it("closes on an order before login and never emits it", () => {
      h.stream.push(encodeMessage(order));

      expect(h.messages).toEqual([]);
      expect(h.errors).toEqual([
        {
          type: "session",
          code: "UNEXPECTED_MESSAGE",
          reason: "Unexpected SUBMIT_ORDER in state UNAUTHENTICATED",
          fatal: true,
          messageType: MessageType.SUBMIT_ORDER,
        },
      ]);
      expect(h.connection.getState()).toBe(ConnectionState.CLOSED);
    });

    it("drops frames that follow a fatal one in the same chunk", () => {
      h.stream.push(Buffer.concat([Buffer.from([0, 0, 0, 5, 0x42]), encodeMessage(loginRequest)]));

      expect(h.messages).toEqual([]);
      expect(h.errors).toHaveLength(1);
    });

    it("does not write what the session refuses", () => {
      expect(() =>
        h.connection.send({
          type: MessageType.ORDER_RESPONSE,
          orderId: "ORD-1",
          accepted: true,
          message: "Order accepted",
        })
      ).toThrow(SessionNotAuthenticatedError);

      expect(h.stream.takeWritten().length).toBe(0);
      expect(h.connection.getState()).toBe(ConnectionState.OPEN);
    });

    it("writes a rejected login before closing", () => {
      h.stream.push(encodeMessage(loginRequest));
      const rejection: Message = {
        type: MessageType.LOGIN_RESPONSE,
        success: false,
        message: "Invalid token",
      };
      h.connection.send(rejection);

      expect(h.stream.takeWritten()).toEqual(encodeMessage(rejection));
      expect(h.errors).toEqual([
        {
          type: "session",
          code: "LOGIN_REJECTED",
          reason: "Login rejected: Invalid token",
          fatal: true,
          messageType: MessageType.LOGIN_RESPONSE,
        },
      ]);
      expect(h.stream.ended).toBe(true);
      expect(() => h.connection.send(loginOk)).toThrow(SessionClosedError);
    });

    it("tracks backpressure", () => {
      authenticate();
      const states: ConnectionState[] = [];
      const drains: number[] = [];
      h.connection.on("state", (state: ConnectionState) => states.push(state));
      h.connection.on("drain", (queued: number) => drains.push(queued));

      h.stream.writable = false;
      h.connection.send({ type: MessageType.HEARTBEAT_ACK });
      expect(h.connection.getState()).toBe(ConnectionState.DRAINING);

      h.stream.emit("drain");
      expect(states).toEqual([ConnectionState.DRAINING, ConnectionState.OPEN]);
      expect(drains).toEqual([0]);
    });

    it("still parses while draining", () => {
      authenticate();
      h.stream.writable = false;
      h.connection.send({ type: MessageType.HEARTBEAT_ACK });

      h.stream.push(encodeMessage(order));
      expect(h.messages).toEqual([loginRequest, order]);
    });

    it("emits heartbeats with the receive time", () => {
      authenticate();
      const beats: Array<[Message, number]> = [];
      h.connection.on("heartbeat", (message: Message, at: number) => beats.push([message, at]));

      clock.advance(250);
      h.stream.push(encodeMessage({ type: MessageType.HEARTBEAT }));

      expect(beats).toEqual([[{ type: MessageType.HEARTBEAT }, 250]]);
      expect(h.messages[1]).toEqual({ type: MessageType.HEARTBEAT });
    });

    it("closes an idle peer on tick", () => {
      h = open({ role: "server", idleTimeoutMs: 1000 }, clock);

      clock.advance(999);
      h.connection.tick();
      expect(h.errors).toEqual([]);

      clock.advance(1);
      h.connection.tick();
      expect(h.errors[0]).toMatchObject({ type: "session", code: "HEARTBEAT_TIMEOUT" });
      expect(h.closes[0]?.reason).toBeInstanceOf(HeartbeatTimeoutError);
    });

    it("reports a transport error and closes", () => {
      h.stream.emit("error", new Error("ECONNRESET"));

      expect(h.errors).toEqual([
        { type: "transport", code: "TRANSPORT_ERROR", reason: "ECONNRESET", fatal: true },
      ]);
      expect(h.connection.getState()).toBe(ConnectionState.CLOSED);
    });

    it("closes with a transport reason when the peer hangs up", () => {
      h.stream.emit("close");

      expect(h.errors).toEqual([]);
      expect(h.closes).toHaveLength(1);
      expect(h.closes[0]?.reason).toBeInstanceOf(TransportError);
      expect(h.closes[0]?.reason?.message).toBe("Connection closed");
      expect(h.connection.session.getState()).toBe(SessionState.CLOSED);
    });

    it("ignores data after close", () => {
      h.connection.close();
      h.stream.push(encodeMessage(loginRequest));

      expect(h.messages).toEqual([]);
      expect(h.connection.getStats().bytesReceived).toBe(0);
    });

    it("closes only once", () => {
      h.connection.close();
      h.connection.close();
      h.stream.emit("close");

      expect(h.closes).toHaveLength(1);
    });
  });

  describe("peer that never finishes", () => {
    let stream: MemoryStream;

    beforeEach(() => {
      stream = new MemoryStream({ closeOnEnd: false });
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("destroys the stream right away after a corrupt frame", () => {
      const h = open({ role: "server" }, clock, stream);

      stream.push(Buffer.from([0, 0, 0, 5, 0x09]));

      expect(stream.ended).toBe(true);
      expect(stream.destroyed).toBe(true);
      expect(h.connection.getState()).toBe(ConnectionState.CLOSED);
      expect(h.closes).toHaveLength(1);
      expect(h.errors[0]).toMatchObject({ code: "UNKNOWN_MESSAGE_TYPE", fatal: true });
    });

    it("destroys the stream once the linger time passes", () => {
      vi.useFakeTimers();
      const h = open({ role: "server", lingerMs: 500 }, clock, stream);

      h.connection.close();
      expect(stream.ended).toBe(true);
      expect(h.connection.getState()).toBe(ConnectionState.CLOSING);

      vi.advanceTimersByTime(499);
      expect(stream.destroyed).toBe(false);

      vi.advanceTimersByTime(1);
      expect(stream.destroyed).toBe(true);
      expect(h.connection.getState()).toBe(ConnectionState.CLOSED);
      expect(h.closes).toHaveLength(1);
    });

    it("lingers after an idle timeout before destroying", () => {
      vi.useFakeTimers();
      const h = open({ role: "server", idleTimeoutMs: 1000, lingerMs: 500 }, clock, stream);

      clock.advance(1000);
      h.connection.tick();
      expect(h.errors[0]).toMatchObject({ code: "HEARTBEAT_TIMEOUT" });
      expect(stream.destroyed).toBe(false);

      vi.advanceTimersByTime(500);
      expect(stream.destroyed).toBe(true);
      expect(h.closes[0]?.reason).toBeInstanceOf(HeartbeatTimeoutError);
    });

    it("does not destroy a stream that finished in time", () => {
      vi.useFakeTimers();
      const h = open({ role: "server", lingerMs: 500 }, clock, stream);

      h.connection.close();
      stream.emit("close");
      vi.advanceTimersByTime(500);

      expect(stream.destroyed).toBe(false);
      expect(h.closes).toHaveLength(1);
    });
  });

  describe("without an error listener", () => {
    it("closes on a corrupt frame without throwing", () => {
      const stream = new MemoryStream();
      const connection = new Connection(stream, "conn-2", { role: "server", clock });

      expect(() => stream.push(Buffer.from([0, 0, 0, 5, 0x09]))).not.toThrow();
      expect(connection.getState()).toBe(ConnectionState.CLOSED);
      expect(stream.ended).toBe(true);
    });
  });

  describe("client role", () => {
    let h: Harness;

    beforeEach(() => {
      h = open({ role: "client" }, clock);
    });

    function login(): void {
      h.connection.send(loginRequest);
      h.stream.push(encodeMessage(loginOk));
      h.stream.takeWritten();
    }

    it("refuses an outbound frame larger than the limit", () => {
      h = open({ role: "client", maxFrameSize: 20 }, clock);

      expect(() =>
        h.connection.send({ type: MessageType.LOGIN_REQUEST, token: "x".repeat(20) })
      ).toThrow(InvalidFieldError);
      expect(h.stream.takeWritten().length).toBe(0);
      expect(h.connection.session.getState()).toBe(SessionState.UNAUTHENTICATED);
    });

    it("sends nothing on tick before login", () => {
      h.connection.tick();
      expect(h.stream.takeWritten().length).toBe(0);
    });

    it("sends one heartbeat per tick while none is outstanding", () => {
      login();

      h.connection.tick();
      expect(h.stream.takeWritten()).toEqual(Buffer.from([0, 0, 0, 5, 5]));

      h.connection.tick();
      expect(h.stream.takeWritten().length).toBe(0);

      h.stream.push(encodeMessage({ type: MessageType.HEARTBEAT_ACK }));
      h.connection.tick();
      expect(h.stream.takeWritten()).toEqual(Buffer.from([0, 0, 0, 5, 5]));
    });

    it("closes when a heartbeat goes unanswered", () => {
      login();
      h.connection.tick();

      clock.advance(15_000);
      h.connection.tick();

      expect(h.errors).toEqual([
        {
          type: "session",
          code: "HEARTBEAT_TIMEOUT",
          reason: "No heartbeat activity for 15000ms (timeout 15000ms)",
          fatal: true,
        },
      ]);
      expect(h.stream.ended).toBe(true);
      expect(h.closes[0]?.reason).toBeInstanceOf(HeartbeatTimeoutError);
    });

    it("closes on a rejected login", () => {
      h.connection.send(loginRequest);
      h.stream.push(
        encodeMessage({ type: MessageType.LOGIN_RESPONSE, success: false, message: "Invalid token" })
      );

      expect(h.messages).toEqual([]);
      expect(h.errors[0]).toMatchObject({ code: "LOGIN_REJECTED" });
      expect(h.connection.getState()).toBe(ConnectionState.CLOSED);
    });
  });
});
